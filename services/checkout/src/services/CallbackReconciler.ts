import { Context, Effect, Option } from "effect"
import type { Duration } from "effect"
import { SqlError } from "@effect/sql"
import type { CallbackId, PaymentNotification } from "../domain/Callback.js"
import type { OrderId, OrderStatus, PaymentStatus } from "../domain/Order.js"
import type { TerminalEventType, TransactionEventType } from "../domain/PaymentTransaction.js"
import type {
  CallbackAuthenticationError,
  ConsistencyViolation,
  ReconciliationError
} from "../domain/errors.js"

// Result of webhook intake
export type IntakeResult =
  | { readonly _tag: "Recorded"; readonly callbackId: CallbackId; readonly checkoutRequestId: string }
  | { readonly _tag: "Rejected"; readonly callbackId: CallbackId; readonly error: ReconciliationError }

// Result of reconciling one notification - discriminated union
export type ReconcileOutcome =
  | { readonly _tag: "Applied"; readonly orderId: OrderId; readonly eventType: TerminalEventType }
  | { readonly _tag: "Duplicate"; readonly orderId: OrderId; readonly eventType: TransactionEventType }
  | {
      readonly _tag: "Late"
      readonly orderId: OrderId
      readonly orderStatus: OrderStatus
      readonly paymentStatus: PaymentStatus
    }
  | {
      readonly _tag: "Conflict"
      readonly orderId: OrderId
      readonly recorded: TransactionEventType
      readonly received: TerminalEventType
    }
  | { readonly _tag: "Unmatched"; readonly error: ReconciliationError }

export class CallbackReconciler extends Context.Tag("CallbackReconciler")<
  CallbackReconciler,
  {
    /**
     * Webhook intake: authenticates the callback and records its raw body
     * in the inbox. Never applies the outcome inline.
     */
    readonly receive: (
      token: Option.Option<string>,
      body: string
    ) => Effect.Effect<IntakeResult, CallbackAuthenticationError | SqlError.SqlError>

    /**
     * Applies a payment outcome to its order exactly once, however often
     * and in whatever order it is delivered.
     */
    readonly reconcile: (
      notification: PaymentNotification
    ) => Effect.Effect<ReconcileOutcome, ConsistencyViolation | SqlError.SqlError>

    /**
     * Times out payments still pending after `timeout` without a callback.
     */
    readonly expireStalePayments: (
      timeout: Duration.Duration
    ) => Effect.Effect<ReadonlyArray<ReconcileOutcome>, SqlError.SqlError>
  }
>() {}
