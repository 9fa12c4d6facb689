import { Layer, Effect, DateTime, Duration, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { CallbackInboxRepository, type RecordCallbackInput } from "./CallbackInboxRepository.js"
import { CallbackId, CallbackStatus, InboxCallback } from "../domain/Callback.js"

export const CALLBACK_CHANNEL = "payment_callbacks"

interface CallbackRow {
  id: string
  checkout_request_id: string | null
  raw_payload: unknown
  status: string
  attempts: number
  last_error: string | null
  received_at: Date
}

const mapRowToCallback = (row: CallbackRow): InboxCallback =>
  new InboxCallback({
    id: Schema.decodeUnknownSync(CallbackId)(row.id),
    checkoutRequestId: row.checkout_request_id,
    rawPayload: row.raw_payload,
    status: Schema.decodeUnknownSync(CallbackStatus)(row.status),
    attempts: row.attempts,
    lastError: row.last_error,
    receivedAt: DateTime.unsafeFromDate(row.received_at)
  })

export const CallbackInboxRepositoryLive = Layer.effect(
  CallbackInboxRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    return {
      record: (input: RecordCallbackInput) =>
        sql.withTransaction(
          Effect.gen(function* () {
            const rows = yield* sql<{ id: string }>`
              INSERT INTO payment_callbacks (
                checkout_request_id, result_code, raw_payload, status, last_error, processed_at
              )
              VALUES (
                ${input.checkoutRequestId},
                ${input.resultCode},
                ${JSON.stringify(input.rawPayload ?? null)}::jsonb,
                ${input.status},
                ${input.lastError},
                ${input.status === "FAILED" ? new Date() : null}
              )
              RETURNING id
            `
            const id = Schema.decodeUnknownSync(CallbackId)(rows[0].id)

            if (input.status === "PENDING") {
              // Delivered on commit; workers also poll in case it is missed
              yield* sql`SELECT pg_notify(${CALLBACK_CHANNEL}, ${id})`
            }

            yield* Effect.logDebug("Recorded payment callback", {
              callbackId: id,
              checkoutRequestId: input.checkoutRequestId,
              status: input.status
            })
            return id
          })
        ),

      claim: (limit: number, lease: Duration.Duration) =>
        Effect.gen(function* () {
          const leaseMs = Duration.toMillis(lease)
          const rows = yield* sql<CallbackRow>`
            UPDATE payment_callbacks
            SET status = 'PROCESSING',
                attempts = attempts + 1,
                locked_until = NOW() + (${leaseMs} * INTERVAL '1 millisecond')
            WHERE id IN (
              SELECT id FROM payment_callbacks
              WHERE (status = 'PENDING' AND (next_retry_at IS NULL OR next_retry_at <= NOW()))
                 OR (status = 'PROCESSING' AND locked_until < NOW())
              ORDER BY received_at ASC
              LIMIT ${limit}
              FOR UPDATE SKIP LOCKED
            )
            RETURNING id, checkout_request_id, raw_payload, status, attempts, last_error, received_at
          `
          yield* Effect.logDebug("Claimed payment callbacks", { count: rows.length })
          return rows.map(mapRowToCallback)
        }),

      markProcessed: (id: CallbackId) =>
        Effect.gen(function* () {
          yield* sql`
            UPDATE payment_callbacks
            SET status = 'PROCESSED', processed_at = NOW(), locked_until = NULL
            WHERE id = ${id}::uuid
          `
          yield* Effect.logDebug("Marked payment callback as processed", { callbackId: id })
        }),

      markFailed: (id: CallbackId, reason: string) =>
        Effect.gen(function* () {
          yield* sql`
            UPDATE payment_callbacks
            SET status = 'FAILED', processed_at = NOW(), locked_until = NULL, last_error = ${reason}
            WHERE id = ${id}::uuid
          `
          yield* Effect.logDebug("Marked payment callback as failed", { callbackId: id, reason })
        }),

      markReview: (id: CallbackId, reason: string) =>
        Effect.gen(function* () {
          yield* sql`
            UPDATE payment_callbacks
            SET status = 'REVIEW', processed_at = NOW(), locked_until = NULL, last_error = ${reason}
            WHERE id = ${id}::uuid
          `
          yield* Effect.logDebug("Marked payment callback for review", { callbackId: id, reason })
        }),

      scheduleRetry: (id: CallbackId, nextRetryAt: DateTime.Utc, reason: string) =>
        Effect.gen(function* () {
          yield* sql`
            UPDATE payment_callbacks
            SET status = 'PENDING',
                next_retry_at = ${DateTime.toDate(nextRetryAt)},
                locked_until = NULL,
                last_error = ${reason}
            WHERE id = ${id}::uuid
          `
          yield* Effect.logDebug("Scheduled payment callback retry", {
            callbackId: id,
            nextRetryAt: DateTime.formatIso(nextRetryAt)
          })
        })
    }
  })
)
