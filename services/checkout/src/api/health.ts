import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { SqlClient } from "@effect/sql"
import { Effect, Schema } from "effect"

const SERVICE_NAME = "checkout-service"

const BacklogRow = Schema.Struct({
  pending: Schema.Int,
  review: Schema.Int
})

// Database round trip plus the callback inbox backlog the worker still owes
export const healthCheck = Effect.gen(function* () {
  const sql = yield* SqlClient.SqlClient
  const startTime = Date.now()

  const rows = yield* sql`
    SELECT
      count(*) FILTER (WHERE status IN ('PENDING', 'PROCESSING'))::int AS pending,
      count(*) FILTER (WHERE status = 'REVIEW')::int AS review
    FROM payment_callbacks
  `
  const backlog = Schema.decodeUnknownOption(BacklogRow)(rows[0])

  return yield* HttpServerResponse.json({
    status: "healthy",
    service: SERVICE_NAME,
    database: "connected",
    latency_ms: Date.now() - startTime,
    callbacks: backlog._tag === "Some"
      ? { pending: backlog.value.pending, awaiting_review: backlog.value.review }
      : null,
    timestamp: new Date().toISOString()
  })
}).pipe(
  Effect.catchAll((error) =>
    Effect.gen(function* () {
      yield* Effect.logWarning("Health check failed", { error: String(error) })
      return yield* HttpServerResponse.json(
        {
          status: "unhealthy",
          service: SERVICE_NAME,
          database: "disconnected",
          error: String(error),
          timestamp: new Date().toISOString()
        },
        { status: 503 }
      )
    })
  )
)

export const HealthRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/health", healthCheck)
)
