import { describe, it, expect } from "vitest"
import { Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import { processCallback, processCallbacks, sweepStalePayments } from "../main.js"
import { CheckoutService } from "../services/CheckoutService.js"
import { PaymentService } from "../services/PaymentService.js"
import { CallbackReconciler } from "../services/CallbackReconciler.js"
import { InboxCallback } from "../domain/Callback.js"
import type { InMemoryStore } from "./support/InMemoryStore.js"
import { checkoutInput, runWithHarness, stkCallback } from "./support/fixtures.js"

const pendingPayment = Effect.gen(function* () {
  const checkout = yield* CheckoutService
  const payments = yield* PaymentService
  const order = yield* checkout.checkout(checkoutInput())
  const initiation = yield* payments.initiate({ orderId: order.id, phoneNumber: Option.none() })
  return initiation.order
})

const post = (payload: unknown) =>
  Effect.flatMap(CallbackReconciler, (reconciler) =>
    reconciler.receive(Option.some("test-callback-token"), JSON.stringify(payload))
  )

const paid = stkCallback({ merchantRequestId: "mr-1", checkoutRequestId: "ws_CO_1", resultCode: 0, amount: 5700 })
const cancelled = stkCallback({ merchantRequestId: "mr-1", checkoutRequestId: "ws_CO_1", resultCode: 1032 })

// Reconciler whose every reconcile hits a database error
const withFailingReconciler = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  Effect.flatMap(CallbackReconciler, (real) =>
    effect.pipe(
      Effect.provideService(
        CallbackReconciler,
        CallbackReconciler.of({
          ...real,
          reconcile: () =>
            Effect.fail(new SqlError.SqlError({
              cause: new Error("Connection failed"),
              message: "Database connection error"
            }))
        })
      )
    )
  )

const statuses = (store: InMemoryStore) =>
  store.callbacks.pipe(Effect.map((rows) => rows.map((row) => row.status)))

describe("processCallbacks", () => {
  it("should return 0 when the inbox is empty", async () => {
    const claimed = await runWithHarness(() => processCallbacks)

    expect(claimed).toBe(0)
  })

  it("should reconcile a received callback and mark it processed", async () => {
    const { claimed, order, rows } = await runWithHarness(({ store }) =>
      Effect.gen(function* () {
        const pending = yield* pendingPayment
        yield* post(paid)
        const claimed = yield* processCallbacks
        return { claimed, order: yield* store.order(pending.id), rows: yield* store.callbacks }
      })
    )

    expect(claimed).toBe(1)
    expect(order.paymentStatus).toBe("paid")
    expect(rows[0]?.status).toBe("PROCESSED")
    expect(rows[0]?.attempts).toBe(1)
  })

  it("should mark redelivered callbacks processed without applying them twice", async () => {
    const { claimed, states, ledger } = await runWithHarness(({ store }) =>
      Effect.gen(function* () {
        yield* pendingPayment
        const claimed = yield* Effect.forEach([paid, paid, paid], (payload) =>
          post(payload).pipe(Effect.zipRight(processCallbacks))
        )
        return { claimed, states: yield* statuses(store), ledger: yield* store.transactions }
      })
    )

    expect(claimed).toEqual([1, 1, 1])
    expect(states).toEqual(["PROCESSED", "PROCESSED", "PROCESSED"])
    expect(ledger.map((tx) => tx.eventType)).toEqual(["payment-initiated", "payment-succeeded"])
  })

  it("should park a conflicting outcome for review", async () => {
    const rows = await runWithHarness(({ store }) =>
      Effect.gen(function* () {
        yield* pendingPayment
        yield* post(cancelled)
        yield* processCallbacks
        yield* post(paid)
        yield* processCallbacks
        return yield* store.callbacks
      })
    )

    expect(rows.map((row) => row.status)).toEqual(["PROCESSED", "REVIEW"])
    expect(rows[1]?.lastError).toBe("conflicting outcome: recorded user-cancelled, received payment-succeeded")
  })

  it("should fail callbacks that match no payment", async () => {
    const rows = await runWithHarness(({ store }) =>
      Effect.gen(function* () {
        yield* post(stkCallback({ merchantRequestId: "mr-7", checkoutRequestId: "ws_CO_7", resultCode: 0, amount: 10 }))
        yield* processCallbacks
        return yield* store.callbacks
      })
    )

    expect(rows[0]?.status).toBe("FAILED")
    expect(rows[0]?.lastError).toBe("unknown_correlation: No payment initiation with this checkout request id")
  })

  it("should never claim a callback rejected at intake", async () => {
    const { claimed, states } = await runWithHarness(({ store }) =>
      Effect.gen(function* () {
        yield* post({ Body: {} })
        const claimed = yield* processCallbacks
        return { claimed, states: yield* statuses(store) }
      })
    )

    expect(claimed).toBe(0)
    expect(states).toEqual(["FAILED"])
  })

  it("should schedule a retry when reconciliation hits a database error", async () => {
    const { rows, reclaimed } = await runWithHarness(({ store }) =>
      Effect.gen(function* () {
        yield* pendingPayment
        yield* post(paid)
        yield* withFailingReconciler(processCallbacks)
        // Backoff puts the retry in the future
        const reclaimed = yield* processCallbacks
        return { rows: yield* store.callbacks, reclaimed }
      })
    )

    expect(rows[0]?.status).toBe("PENDING")
    expect(rows[0]?.attempts).toBe(1)
    expect(rows[0]?.lastError).toBe("Database connection error")
    expect(reclaimed).toBe(0)
  })
})

describe("processCallback", () => {
  it("should give up once the retry budget is spent", async () => {
    const row = await runWithHarness(({ store }) =>
      Effect.gen(function* () {
        yield* pendingPayment
        yield* post(paid)
        const [recorded] = yield* store.callbacks
        if (recorded === undefined) {
          return yield* Effect.dieMessage("callback was not recorded")
        }
        yield* withFailingReconciler(
          processCallback(
            new InboxCallback({
              id: recorded.id,
              checkoutRequestId: recorded.checkoutRequestId,
              rawPayload: recorded.rawPayload,
              status: "PROCESSING",
              attempts: 3,
              lastError: null,
              receivedAt: recorded.receivedAt
            })
          )
        )
        return (yield* store.callbacks)[0]
      })
    )

    expect(row?.status).toBe("FAILED")
    expect(row?.lastError).toBe("retries exhausted: Database connection error")
  })
})

describe("sweepStalePayments", () => {
  it("should time out payments past the configured timeout", async () => {
    const { expired, order } = await runWithHarness(({ store }) =>
      Effect.gen(function* () {
        const pending = yield* pendingPayment
        yield* store.ageInitiation("ws_CO_1", "6 minutes")
        const expired = yield* sweepStalePayments
        return { expired, order: yield* store.order(pending.id) }
      })
    )

    expect(expired).toBe(1)
    expect(order.paymentStatus).toBe("failed")
  })
})
