import { Context, Effect } from "effect"
import type { DateTime, Duration } from "effect"
import { SqlError } from "@effect/sql"
import type { CallbackId, InboxCallback } from "../domain/Callback.js"

export interface RecordCallbackInput {
  readonly checkoutRequestId: string | null
  readonly resultCode: number | null
  readonly rawPayload: unknown
  // Malformed envelopes are stored for audit but never claimed
  readonly status: "PENDING" | "FAILED"
  readonly lastError: string | null
}

export class CallbackInboxRepository extends Context.Tag("CallbackInboxRepository")<
  CallbackInboxRepository,
  {
    /**
     * Durably records a callback and notifies listening workers
     * (NOTIFY payment_callbacks).
     */
    readonly record: (input: RecordCallbackInput) => Effect.Effect<CallbackId, SqlError.SqlError>

    /**
     * Claims up to `limit` callbacks for processing with FOR UPDATE SKIP LOCKED.
     * Claimable: PENDING rows whose next_retry_at is due, and PROCESSING rows
     * whose lease has expired (a worker died mid-way). Claimed rows are
     * leased for `lease` and their attempt count incremented.
     */
    readonly claim: (
      limit: number,
      lease: Duration.Duration
    ) => Effect.Effect<ReadonlyArray<InboxCallback>, SqlError.SqlError>

    readonly markProcessed: (id: CallbackId) => Effect.Effect<void, SqlError.SqlError>

    /**
     * Terminal failure: unknown correlation or retries exhausted.
     */
    readonly markFailed: (id: CallbackId, reason: string) => Effect.Effect<void, SqlError.SqlError>

    /**
     * Parked for manual reconciliation (conflicting outcome).
     */
    readonly markReview: (id: CallbackId, reason: string) => Effect.Effect<void, SqlError.SqlError>

    /**
     * Returns the row to PENDING, due again at nextRetryAt.
     */
    readonly scheduleRetry: (
      id: CallbackId,
      nextRetryAt: DateTime.Utc,
      reason: string
    ) => Effect.Effect<void, SqlError.SqlError>
  }
>() {}
