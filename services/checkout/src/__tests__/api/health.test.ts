import { describe, it, expect } from "vitest"
import { Effect, Layer } from "effect"
import { HttpApp } from "@effect/platform"
import { SqlClient, SqlError } from "@effect/sql"
import { HealthRoutes } from "../../api/health.js"
import { Quiet } from "../support/fixtures.js"

// Answers every query with the given rows, or fails like a dropped connection
const createMockSqlClient = (config: { shouldSucceed: boolean; rows?: ReadonlyArray<unknown> }) => {
  const query = () =>
    config.shouldSucceed
      ? Effect.succeed(config.rows ?? [])
      : Effect.fail(
        new SqlError.SqlError({
          cause: new Error("Connection failed"),
          message: "Database connection error"
        })
      )

  // The client is called as a template literal tag
  const proxyClient = new Proxy(query, {
    apply: () => query()
  })

  return Layer.succeed(SqlClient.SqlClient, proxyClient as unknown as SqlClient.SqlClient)
}

const runHealthCheck = async (sqlClientLayer: Layer.Layer<SqlClient.SqlClient>) => {
  const handler = HttpApp.toWebHandler(
    HealthRoutes.pipe(Effect.provide(sqlClientLayer), Effect.provide(Quiet))
  )
  const response = await handler(new Request("http://localhost/health"))
  const body: unknown = await response.json()
  return { status: response.status, body }
}

describe("GET /health", () => {
  it("should report the callback backlog when the database answers", async () => {
    const result = await runHealthCheck(
      createMockSqlClient({ shouldSucceed: true, rows: [{ pending: 2, review: 1 }] })
    )

    expect(result.status).toBe(200)
    expect(result.body).toMatchObject({
      status: "healthy",
      service: "checkout-service",
      database: "connected",
      latency_ms: expect.any(Number),
      callbacks: { pending: 2, awaiting_review: 1 }
    })
  })

  it("should leave the backlog empty when the counts cannot be read", async () => {
    const result = await runHealthCheck(createMockSqlClient({ shouldSucceed: true, rows: [] }))

    expect(result.status).toBe(200)
    expect(result.body).toMatchObject({ status: "healthy", callbacks: null })
  })

  it("should return 503 when the database is unreachable", async () => {
    const result = await runHealthCheck(createMockSqlClient({ shouldSucceed: false }))

    expect(result.status).toBe(503)
    expect(result.body).toMatchObject({
      status: "unhealthy",
      service: "checkout-service",
      database: "disconnected"
    })
    expect(result.body).not.toHaveProperty("latency_ms")
  })

  it("should stamp the response with an ISO timestamp", async () => {
    const result = await runHealthCheck(createMockSqlClient({ shouldSucceed: true, rows: [] }))

    expect(result.body).toMatchObject({
      timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/)
    })
  })
})
