import { Layer, Effect } from "effect"
import { SqlClient } from "@effect/sql"
import { UnitOfWork } from "./UnitOfWork.js"

export const UnitOfWorkLive = Layer.effect(
  UnitOfWork,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient
    return {
      transaction: <A, E, R>(effect: Effect.Effect<A, E, R>) => sql.withTransaction(effect)
    }
  })
)
