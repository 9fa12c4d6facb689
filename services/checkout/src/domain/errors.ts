import { Data } from "effect"

export interface FieldIssue {
  readonly field: string
  readonly message: string
}

/**
 * Malformed cart, contact or phone input. User-correctable; every issue
 * names the offending field.
 */
export class ValidationError extends Data.TaggedError("ValidationError")<{
  readonly issues: ReadonlyArray<FieldIssue>
}> {}

/**
 * Not enough unreserved stock for a line. Checkout is aborted as a whole.
 */
export class InsufficientStockError extends Data.TaggedError("InsufficientStockError")<{
  readonly productId: string
  readonly productSku: string
  readonly requested: number
  readonly available: number
}> {}

export class ProductNotFoundError extends Data.TaggedError("ProductNotFoundError")<{
  readonly productId: string
}> {}

export class OrderNotFoundError extends Data.TaggedError("OrderNotFoundError")<{
  readonly orderId: string
  readonly searchedBy: "id" | "orderNumber"
}> {}

// Order is not in a state that accepts a new payment attempt
export class PaymentNotAllowedError extends Data.TaggedError("PaymentNotAllowedError")<{
  readonly orderId: string
  readonly orderStatus: string
  readonly paymentStatus: string
}> {}

/**
 * Network failure or provider rejection while initiating a payment.
 * The order stays unpaid and the customer may retry.
 */
export class GatewayError extends Data.TaggedError("GatewayError")<{
  readonly operation: "authenticate" | "stkPush"
  readonly reason: string
  readonly responseCode?: string
  readonly statusCode?: number
  readonly isRetryable: boolean
}> {}

/**
 * An attempted state transition from an unexpected source state.
 * A logic fault: rejected, never coerced.
 */
export class ConsistencyViolation extends Data.TaggedError("ConsistencyViolation")<{
  readonly entity: "order" | "stock"
  readonly entityId: string
  readonly attempted: string
  readonly reason: string
}> {}

/**
 * A callback that cannot be applied. Recorded for audit and acknowledged
 * to the gateway; never surfaced to it as a failure.
 */
export class ReconciliationError extends Data.TaggedError("ReconciliationError")<{
  readonly checkoutRequestId: string
  readonly reason: "unknown_correlation" | "malformed_envelope"
  readonly detail: string
}> {}

// Callback carried a token that does not match the configured one
export class CallbackAuthenticationError extends Data.TaggedError("CallbackAuthenticationError")<{
  readonly _void?: never
}> {}
