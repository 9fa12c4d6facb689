import { Effect, Schedule, Duration, Queue, Data, DateTime, Either, Match, Redacted } from "effect"
import { SqlClient } from "@effect/sql"
import pg from "pg"
import { WorkerConfig } from "./config.js"
import { DatabaseConnectionConfig } from "./db.js"
import { CallbackInboxRepository } from "./repositories/CallbackInboxRepository.js"
import { CALLBACK_CHANNEL } from "./repositories/CallbackInboxRepositoryLive.js"
import { CallbackReconciler } from "./services/CallbackReconciler.js"
import { parseNotification, type InboxCallback } from "./domain/Callback.js"
import { calculateNextRetryAt, isMaxRetriesExceeded, type RetryPolicy } from "./domain/RetryPolicy.js"

/**
 * Reconcile one claimed callback and settle its inbox row.
 * Outcomes are final; internal errors go back to the inbox with backoff.
 */
export const processCallback = (callback: InboxCallback) =>
  Effect.gen(function* () {
    const inbox = yield* CallbackInboxRepository
    const reconciler = yield* CallbackReconciler
    const config = yield* WorkerConfig

    const result = yield* parseNotification(callback.rawPayload).pipe(
      Effect.flatMap(reconciler.reconcile),
      Effect.either
    )

    if (Either.isRight(result)) {
      return yield* Match.value(result.right).pipe(
        Match.tag("Applied", "Duplicate", "Late", () => inbox.markProcessed(callback.id)),
        Match.tag("Conflict", ({ recorded, received }) =>
          inbox.markReview(callback.id, `conflicting outcome: recorded ${recorded}, received ${received}`)
        ),
        Match.tag("Unmatched", ({ error }) => inbox.markFailed(callback.id, `${error.reason}: ${error.detail}`)),
        Match.exhaustive
      )
    }

    const error = result.left
    if (error._tag === "ReconciliationError") {
      return yield* inbox.markFailed(callback.id, `${error.reason}: ${error.detail}`)
    }

    const reason = error._tag === "ConsistencyViolation" ? error.reason : error.message
    if (isMaxRetriesExceeded(callback.attempts, config.maxRetryAttempts)) {
      yield* Effect.logError("Payment callback retries exhausted", {
        callbackId: callback.id,
        checkoutRequestId: callback.checkoutRequestId,
        attempts: callback.attempts,
        reason
      })
      return yield* inbox.markFailed(callback.id, `retries exhausted: ${reason}`)
    }

    const policy: RetryPolicy = {
      maxAttempts: config.maxRetryAttempts,
      baseDelayMs: config.retryBaseDelayMs,
      backoffMultiplier: config.retryBackoffMultiplier,
      maxDelayMs: config.retryMaxDelayMs
    }
    const nextRetryAt = calculateNextRetryAt(callback.attempts + 1, policy, yield* DateTime.now)
    yield* Effect.logWarning("Payment callback will be retried", {
      callbackId: callback.id,
      checkoutRequestId: callback.checkoutRequestId,
      attempts: callback.attempts,
      error: error._tag,
      reason
    })
    return yield* inbox.scheduleRetry(callback.id, nextRetryAt, reason)
  }).pipe(
    Effect.withSpan("process-payment-callback", {
      attributes: { callbackId: callback.id, attempts: callback.attempts }
    })
  )

/**
 * Claim a batch of inbox callbacks (FOR UPDATE SKIP LOCKED, leased) and
 * reconcile them with bounded concurrency. Each reconciliation runs in its
 * own transaction. Returns the number of callbacks claimed.
 */
export const processCallbacks = Effect.gen(function* () {
  const inbox = yield* CallbackInboxRepository
  const config = yield* WorkerConfig

  const claimed = yield* inbox.claim(config.batchSize, Duration.millis(config.leaseMs))

  if (claimed.length === 0) {
    yield* Effect.logDebug("No payment callbacks to process")
    return 0
  }

  yield* Effect.logInfo("Processing payment callbacks", { count: claimed.length })

  yield* Effect.forEach(
    claimed,
    (callback) =>
      processCallback(callback).pipe(
        // Row stays PROCESSING and is reclaimed once its lease expires
        Effect.catchAll((error) =>
          Effect.logError("Failed to settle payment callback", {
            callbackId: callback.id,
            error: error.message
          })
        )
      ),
    { concurrency: config.concurrency, discard: true }
  )

  return claimed.length
})

/**
 * Time out payments that never got a callback.
 */
export const sweepStalePayments = Effect.gen(function* () {
  const reconciler = yield* CallbackReconciler
  const config = yield* WorkerConfig

  const outcomes = yield* reconciler.expireStalePayments(Duration.seconds(config.paymentTimeoutSeconds))
  if (outcomes.length > 0) {
    yield* Effect.logInfo("Expired stale payments", { count: outcomes.length })
  }
  return outcomes.length
})

// Loop bodies must survive a failed iteration
const logAndContinue = (loop: string) => (error: { readonly message: string }) =>
  Effect.logError("Worker iteration failed", { loop, error: error.message })

/**
 * Polling fallback - runs every WORKER_POLL_INTERVAL_MS.
 * Catches callbacks whose NOTIFY was missed and retries that came due.
 */
export const createPollingLoop = Effect.gen(function* () {
  const config = yield* WorkerConfig

  yield* Effect.logInfo("Starting polling loop", { intervalMs: config.pollIntervalMs })

  yield* processCallbacks.pipe(
    Effect.catchAll(logAndContinue("poll")),
    Effect.repeat(Schedule.spaced(Duration.millis(config.pollIntervalMs)))
  )
})

export const createSweepLoop = Effect.gen(function* () {
  const config = yield* WorkerConfig

  yield* Effect.logInfo("Starting payment timeout sweep", {
    intervalMs: config.sweepIntervalMs,
    timeoutSeconds: config.paymentTimeoutSeconds
  })

  yield* sweepStalePayments.pipe(
    Effect.catchAll(logAndContinue("sweep")),
    Effect.repeat(Schedule.spaced(Duration.millis(config.sweepIntervalMs)))
  )
})

/**
 * Dedicated PostgreSQL connection for LISTEN payment_callbacks.
 * Returns a queue that receives one entry per notification.
 */
export const createListenConnection = Effect.gen(function* () {
  const notificationQueue = yield* Queue.unbounded<string>()
  const dbConfig = yield* DatabaseConnectionConfig

  yield* Effect.logInfo("Creating LISTEN connection", {
    host: dbConfig.host,
    port: dbConfig.port,
    database: dbConfig.database
  })

  const client = new pg.Client({
    host: dbConfig.host,
    port: dbConfig.port,
    database: dbConfig.database,
    user: dbConfig.username,
    password: Redacted.value(dbConfig.password)
  })

  yield* Effect.tryPromise({
    try: () => client.connect(),
    catch: (error) => new ListenConnectionError({ cause: error })
  })

  client.on("notification", (msg) => {
    if (msg.channel === CALLBACK_CHANNEL) {
      Effect.runFork(
        Effect.gen(function* () {
          yield* Effect.logDebug("Received notification", { channel: msg.channel, callbackId: msg.payload })
          yield* Queue.offer(notificationQueue, msg.payload ?? "")
        })
      )
    }
  })

  client.on("error", (error) => {
    Effect.runFork(
      Effect.logError("LISTEN connection error", { error: error.message })
    )
  })

  yield* Effect.tryPromise({
    try: () => client.query(`LISTEN ${CALLBACK_CHANNEL}`),
    catch: (error) => new ListenConnectionError({ cause: error })
  })

  yield* Effect.logInfo("Subscribed to notification channel", { channel: CALLBACK_CHANNEL })

  yield* Effect.addFinalizer(() =>
    Effect.gen(function* () {
      yield* Effect.logInfo("Closing LISTEN connection")
      yield* Effect.tryPromise(() => client.end()).pipe(
        Effect.catchAll((error) => Effect.logWarning("Error closing LISTEN connection", { error: error.message }))
      )
    })
  )

  return notificationQueue
})

/**
 * Drain notifications into batches: a burst of NOTIFYs triggers one claim.
 */
export const notificationLoop = (queue: Queue.Queue<string>) =>
  Effect.gen(function* () {
    yield* Effect.logInfo("Starting notification loop")

    yield* Effect.forever(
      Effect.gen(function* () {
        yield* Queue.take(queue)
        const burst = yield* Queue.takeAll(queue)
        yield* Effect.logDebug("Processing notifications", { count: burst.length + 1 })
        yield* processCallbacks.pipe(Effect.catchAll(logAndContinue("notify")))
      })
    )
  })

/**
 * Callback worker: LISTEN subscription, polling fallback and payment
 * timeout sweep, run concurrently. Never terminates under normal operation.
 */
export const main = Effect.gen(function* () {
  yield* Effect.logInfo("Payment callback worker starting...")

  const sql = yield* SqlClient.SqlClient
  const result = yield* sql`SELECT 1 as health_check`
  yield* Effect.logInfo("Database connection verified", { check: result[0] })

  const notificationQueue = yield* createListenConnection

  yield* Effect.all([
    notificationLoop(notificationQueue),
    createPollingLoop,
    createSweepLoop
  ], { concurrency: "unbounded" })
}).pipe(
  Effect.withSpan("callback-worker-main"),
  Effect.scoped,
  Effect.catchAllCause((cause) =>
    Effect.gen(function* () {
      yield* Effect.logError("Callback worker fatal error", { cause })
      return yield* Effect.failCause(cause)
    })
  )
)

class ListenConnectionError extends Data.TaggedError("ListenConnectionError")<{
  readonly cause: unknown
}> {}
