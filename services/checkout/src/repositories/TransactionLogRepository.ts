import { Context, Effect, Option } from "effect"
import type { DateTime } from "effect"
import { SqlError } from "@effect/sql"
import type { OrderId } from "../domain/Order.js"
import type { NewPaymentTransaction, PaymentTransaction } from "../domain/PaymentTransaction.js"

export type AppendResult =
  | { readonly _tag: "Appended"; readonly transaction: PaymentTransaction }
  | { readonly _tag: "AlreadyRecorded" }

// A payment attempt still waiting for its outcome
export interface OpenInitiation {
  readonly orderId: OrderId
  readonly merchantRequestId: string
  readonly checkoutRequestId: string
  readonly initiatedAt: DateTime.Utc
}

export class TransactionLogRepository extends Context.Tag("TransactionLogRepository")<
  TransactionLogRepository,
  {
    /**
     * Appends an entry. A second entry with the same
     * (checkoutRequestId, eventType) is not written.
     */
    readonly append: (
      entry: NewPaymentTransaction
    ) => Effect.Effect<AppendResult, SqlError.SqlError>

    /**
     * The terminal outcome already recorded for a checkout request, if any.
     */
    readonly findTerminal: (
      checkoutRequestId: string
    ) => Effect.Effect<Option.Option<PaymentTransaction>, SqlError.SqlError>

    /**
     * The payment-initiated entry that created a checkout request.
     */
    readonly findInitiation: (
      checkoutRequestId: string
    ) => Effect.Effect<Option.Option<PaymentTransaction>, SqlError.SqlError>

    /**
     * Initiations older than the cutoff that have no terminal outcome and
     * whose order is still waiting on payment.
     */
    readonly findOpenInitiations: (
      initiatedBefore: DateTime.Utc,
      limit: number
    ) => Effect.Effect<ReadonlyArray<OpenInitiation>, SqlError.SqlError>
  }
>() {}
