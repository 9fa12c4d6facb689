import { Layer, Effect, DateTime, Duration, Either, Option, Redacted, Schema } from "effect"
import { timingSafeEqual } from "node:crypto"
import {
  CallbackReconciler,
  type IntakeResult,
  type ReconcileOutcome
} from "./CallbackReconciler.js"
import { OrderStore } from "./OrderStore.js"
import { StockLedger } from "./StockLedger.js"
import { CallbackInboxRepository } from "../repositories/CallbackInboxRepository.js"
import { TransactionLogRepository } from "../repositories/TransactionLogRepository.js"
import { UnitOfWork } from "../repositories/UnitOfWork.js"
import { CheckoutConfig, GatewayConfig } from "../config.js"
import {
  parseNotification,
  timeoutNotification,
  type PaymentNotification
} from "../domain/Callback.js"
import { classifyResultCode, type TerminalEventType } from "../domain/PaymentTransaction.js"
import { formatCents } from "../domain/Money.js"
import type { OrderEvent } from "../domain/OrderState.js"
import {
  CallbackAuthenticationError,
  ConsistencyViolation,
  ReconciliationError
} from "../domain/errors.js"

const decodeJson = Schema.decodeEither(Schema.parseJson())

// Stale initiations expired per sweep run
const SWEEP_BATCH_SIZE = 100

const tokensMatch = (received: string, expected: string): boolean => {
  const a = Buffer.from(received)
  const b = Buffer.from(expected)
  return a.length === b.length && timingSafeEqual(a, b)
}

// Redeliveries agree with the recorded outcome when both carry the same result
// code (a recorded amount mismatch included) or when neither is a success
const sameVerdict = (recordedCode: number | null, receivedCode: number): boolean =>
  recordedCode === receivedCode || (recordedCode !== 0 && receivedCode !== 0)

export const CallbackReconcilerLive = Layer.effect(
  CallbackReconciler,
  Effect.gen(function* () {
    const orderStore = yield* OrderStore
    const stockLedger = yield* StockLedger
    const transactionLog = yield* TransactionLogRepository
    const inbox = yield* CallbackInboxRepository
    const unitOfWork = yield* UnitOfWork
    const gatewayConfig = yield* GatewayConfig
    const checkoutConfig = yield* CheckoutConfig

    const reconcile = (notification: PaymentNotification) =>
      Effect.gen(function* () {
        const checkoutRequestId = notification.checkoutRequestId
        const received = classifyResultCode(notification.resultCode)

        // Idempotency: at most one terminal outcome per checkout request
        const recorded = yield* transactionLog.findTerminal(checkoutRequestId)
        if (Option.isSome(recorded)) {
          const existing = recorded.value
          if (sameVerdict(existing.resultCode, notification.resultCode)) {
            yield* Effect.logDebug("Duplicate payment callback", {
              checkoutRequestId,
              eventType: existing.eventType
            })
            return {
              _tag: "Duplicate",
              orderId: existing.orderId,
              eventType: existing.eventType
            } satisfies ReconcileOutcome
          }
          // e.g. a real success after the timeout sweep released the stock
          yield* Effect.logError("Conflicting payment outcome needs manual reconciliation", {
            checkoutRequestId,
            orderId: existing.orderId,
            recorded: existing.eventType,
            received,
            receiptNumber: notification.receiptNumber
          })
          return {
            _tag: "Conflict",
            orderId: existing.orderId,
            recorded: existing.eventType,
            received
          } satisfies ReconcileOutcome
        }

        // Correlation
        const initiation = yield* transactionLog.findInitiation(checkoutRequestId)
        if (
          Option.isNone(initiation) ||
          initiation.value.merchantRequestId !== notification.merchantRequestId
        ) {
          const error = new ReconciliationError({
            checkoutRequestId,
            reason: "unknown_correlation",
            detail: Option.isNone(initiation)
              ? "No payment initiation with this checkout request id"
              : `Merchant request id ${notification.merchantRequestId} does not match ${initiation.value.merchantRequestId}`
          })
          yield* Effect.logWarning("Unmatched payment callback", {
            checkoutRequestId,
            merchantRequestId: notification.merchantRequestId,
            detail: error.detail
          })
          return { _tag: "Unmatched", error } satisfies ReconcileOutcome
        }

        const order = yield* orderStore.get(initiation.value.orderId).pipe(
          // The ledger references orders by foreign key; a missing order is corruption
          Effect.catchTag("OrderNotFoundError", (error) =>
            Effect.fail(new ConsistencyViolation({
              entity: "order",
              entityId: error.orderId,
              attempted: "reconcile",
              reason: "transaction log references a missing order"
            }))
          )
        )

        // Late: the order is no longer waiting on this payment
        if (order.orderStatus !== "pending" || order.paymentStatus !== "pending") {
          yield* Effect.logWarning("Late payment callback ignored", {
            checkoutRequestId,
            orderId: order.id,
            orderStatus: order.orderStatus,
            paymentStatus: order.paymentStatus,
            received
          })
          return {
            _tag: "Late",
            orderId: order.id,
            orderStatus: order.orderStatus,
            paymentStatus: order.paymentStatus
          } satisfies ReconcileOutcome
        }

        // Amount cross-check
        const expectedCents = initiation.value.amountCents ?? order.totalCents
        let outcome: TerminalEventType = received
        let resultDesc = notification.resultDesc
        if (received === "payment-succeeded" && notification.amountCents !== expectedCents) {
          outcome = "payment-failed"
          resultDesc = `Amount mismatch: expected ${formatCents(expectedCents)}, received ${
            notification.amountCents === null ? "none" : formatCents(notification.amountCents)
          }`
          yield* Effect.logError("Payment amount mismatch", {
            checkoutRequestId,
            orderId: order.id,
            expectedCents,
            receivedCents: notification.amountCents
          })
        }

        // Transition, stock and ledger commit or roll back together
        const paidAt = yield* DateTime.now
        const event: OrderEvent =
          outcome === "payment-succeeded"
            ? { _tag: "PaymentSucceeded", paidAt }
            : { _tag: "PaymentFailed", maxAttempts: checkoutConfig.maxPaymentAttempts }
        const lines = order.items.map((item) => ({ productId: item.productId, quantity: item.quantity }))

        const updated = yield* unitOfWork.transaction(
          Effect.gen(function* () {
            const next = yield* orderStore.transition(order, event)
            if (outcome === "payment-succeeded") {
              yield* stockLedger.commitAll(lines)
            } else {
              yield* stockLedger.releaseAll(lines)
            }
            const appended = yield* transactionLog.append({
              orderId: order.id,
              eventType: outcome,
              merchantRequestId: notification.merchantRequestId,
              checkoutRequestId,
              phoneNumber: notification.payerPhone,
              amountCents: notification.amountCents,
              resultCode: notification.resultCode,
              resultDesc,
              receiptNumber: notification.receiptNumber,
              rawPayload: notification
            })
            if (appended._tag === "AlreadyRecorded") {
              return yield* Effect.fail(new ConsistencyViolation({
                entity: "order",
                entityId: order.id,
                attempted: outcome,
                reason: "outcome recorded concurrently for the same checkout request"
              }))
            }
            return next
          })
        )

        yield* Effect.logInfo("Payment reconciled", {
          checkoutRequestId,
          orderId: order.id,
          outcome,
          orderStatus: updated.orderStatus,
          paymentStatus: updated.paymentStatus
        })
        return { _tag: "Applied", orderId: order.id, eventType: outcome } satisfies ReconcileOutcome
      }).pipe(
        Effect.withSpan("CallbackReconciler.reconcile", {
          attributes: { checkoutRequestId: notification.checkoutRequestId }
        })
      )

    return {
      receive: (token: Option.Option<string>, body: string) =>
        Effect.gen(function* () {
          const expected = Redacted.value(gatewayConfig.callbackToken)
          if (Option.isNone(token) || !tokensMatch(token.value, expected)) {
            yield* Effect.logWarning("Rejected payment callback with invalid token")
            return yield* Effect.fail(new CallbackAuthenticationError({}))
          }

          // A body that is not JSON is kept as the text it arrived as
          const json = decodeJson(body)
          const payload = Either.getOrElse(json, () => body)
          const parsed = yield* Effect.either(
            Effect.flatMap(
              Either.mapLeft(json, () =>
                new ReconciliationError({
                  checkoutRequestId: "unknown",
                  reason: "malformed_envelope",
                  detail: "Request body is not valid JSON"
                })
              ),
              parseNotification
            )
          )
          if (Either.isLeft(parsed)) {
            const callbackId = yield* inbox.record({
              checkoutRequestId: null,
              resultCode: null,
              rawPayload: payload,
              status: "FAILED",
              lastError: `${parsed.left.reason}: ${parsed.left.detail}`
            })
            yield* Effect.logWarning("Malformed payment callback recorded", {
              callbackId,
              detail: parsed.left.detail
            })
            return { _tag: "Rejected", callbackId, error: parsed.left } satisfies IntakeResult
          }

          const notification = parsed.right
          const callbackId = yield* inbox.record({
            checkoutRequestId: notification.checkoutRequestId,
            resultCode: notification.resultCode,
            rawPayload: payload,
            status: "PENDING",
            lastError: null
          })
          yield* Effect.logInfo("Payment callback received", {
            callbackId,
            checkoutRequestId: notification.checkoutRequestId,
            resultCode: notification.resultCode
          })
          return {
            _tag: "Recorded",
            callbackId,
            checkoutRequestId: notification.checkoutRequestId
          } satisfies IntakeResult
        }).pipe(Effect.withSpan("CallbackReconciler.receive")),

      reconcile,

      expireStalePayments: (timeout: Duration.Duration) =>
        Effect.gen(function* () {
          const now = yield* DateTime.now
          const stale = yield* transactionLog.findOpenInitiations(
            DateTime.subtractDuration(now, timeout),
            SWEEP_BATCH_SIZE
          )
          if (stale.length === 0) {
            return []
          }

          yield* Effect.logInfo("Expiring stale payments", { count: stale.length })

          const outcomes = yield* Effect.forEach(stale, (initiation) =>
            reconcile(
              timeoutNotification({
                merchantRequestId: initiation.merchantRequestId,
                checkoutRequestId: initiation.checkoutRequestId,
                timeoutSeconds: Math.round(Duration.toSeconds(timeout))
              })
            ).pipe(
              Effect.map(Option.some),
              // A callback racing the sweep loses the CAS; the next run sees it settled
              Effect.catchTag("ConsistencyViolation", (violation) =>
                Effect.logWarning("Skipped stale payment", {
                  checkoutRequestId: initiation.checkoutRequestId,
                  reason: violation.reason
                }).pipe(Effect.as(Option.none<ReconcileOutcome>()))
              )
            )
          )
          return outcomes.flatMap(Option.toArray)
        }).pipe(Effect.withSpan("CallbackReconciler.expireStalePayments"))
    }
  })
)
