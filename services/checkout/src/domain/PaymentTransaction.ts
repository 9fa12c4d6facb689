import { Schema } from "effect"
import { OrderId } from "./Order.js"

export const PaymentTransactionId = Schema.UUID.pipe(Schema.brand("PaymentTransactionId"))
export type PaymentTransactionId = typeof PaymentTransactionId.Type

// Outcomes that close a payment attempt. At most one per checkout request.
export const TerminalEventType = Schema.Literal(
  "provider-timeout",
  "user-cancelled",
  "payment-succeeded",
  "payment-failed"
)
export type TerminalEventType = typeof TerminalEventType.Type

export const TransactionEventType = Schema.Literal(
  "payment-initiated",
  "initiation-failed",
  ...TerminalEventType.literals
)
export type TransactionEventType = typeof TransactionEventType.Type

export const isTerminalEventType = Schema.is(TerminalEventType)

/**
 * Append-only audit record of everything that happened to a payment.
 * (checkoutRequestId, eventType) is unique.
 */
export class PaymentTransaction extends Schema.Class<PaymentTransaction>("PaymentTransaction")({
  id: PaymentTransactionId,
  orderId: OrderId,
  eventType: TransactionEventType,
  merchantRequestId: Schema.NullOr(Schema.String),
  checkoutRequestId: Schema.NullOr(Schema.String),
  phoneNumber: Schema.NullOr(Schema.String),
  amountCents: Schema.NullOr(Schema.Int),
  resultCode: Schema.NullOr(Schema.Int),
  resultDesc: Schema.NullOr(Schema.String),
  receiptNumber: Schema.NullOr(Schema.String),
  rawPayload: Schema.Unknown,
  createdAt: Schema.DateTimeUtc
}) {}

export interface NewPaymentTransaction {
  readonly orderId: OrderId
  readonly eventType: TransactionEventType
  readonly merchantRequestId: string | null
  readonly checkoutRequestId: string | null
  readonly phoneNumber: string | null
  readonly amountCents: number | null
  readonly resultCode: number | null
  readonly resultDesc: string | null
  readonly receiptNumber: string | null
  readonly rawPayload: unknown
}

/**
 * Gateway result codes: 0 success, 1032 cancelled by the customer,
 * 1037 customer unreachable before the prompt expired. Everything else
 * (insufficient balance, wrong PIN, ...) is a failed payment.
 */
export const classifyResultCode = (resultCode: number): TerminalEventType => {
  switch (resultCode) {
    case 0:
      return "payment-succeeded"
    case 1032:
      return "user-cancelled"
    case 1037:
      return "provider-timeout"
    default:
      return "payment-failed"
  }
}

export class InitiatePaymentRequest extends Schema.Class<InitiatePaymentRequest>("InitiatePaymentRequest")({
  order_id: OrderId,
  // Falls back to the recipient phone on the order
  phone_number: Schema.optional(Schema.String)
}) {}
