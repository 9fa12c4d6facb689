import { PgClient } from "@effect/sql-pg"
import { Config, Redacted } from "effect"

const connection = {
  host: Config.string("DATABASE_HOST").pipe(Config.withDefault("localhost")),
  port: Config.number("DATABASE_PORT").pipe(Config.withDefault(5432)),
  database: Config.string("DATABASE_NAME").pipe(Config.withDefault("autoparts")),
  username: Config.string("DATABASE_USER").pipe(Config.withDefault("autoparts")),
  password: Config.redacted("DATABASE_PASSWORD").pipe(
    Config.withDefault(Redacted.make("autoparts"))
  )
}

export const DatabaseLive = PgClient.layerConfig(connection)

// Same settings, for the dedicated LISTEN connection
export const DatabaseConnectionConfig = Config.all(connection)
