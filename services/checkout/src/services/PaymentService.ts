import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type { Order, OrderId } from "../domain/Order.js"
import type {
  ConsistencyViolation,
  GatewayError,
  InsufficientStockError,
  OrderNotFoundError,
  PaymentNotAllowedError,
  ProductNotFoundError,
  ValidationError
} from "../domain/errors.js"

export interface InitiatePaymentInput {
  readonly orderId: OrderId
  // Defaults to the order's recipient phone
  readonly phoneNumber: Option.Option<string>
}

export interface PaymentInitiation {
  readonly order: Order
  readonly merchantRequestId: string
  readonly checkoutRequestId: string
  readonly customerMessage: string
  readonly responseDescription: string
}

export type InitiatePaymentError =
  | ValidationError
  | OrderNotFoundError
  | PaymentNotAllowedError
  | InsufficientStockError
  | ProductNotFoundError
  | GatewayError
  | ConsistencyViolation
  | SqlError.SqlError

export class PaymentService extends Context.Tag("PaymentService")<
  PaymentService,
  {
    /**
     * Sends a payment prompt for an unpaid (or previously failed) order.
     * A failed attempt renews the stock reservation first.
     */
    readonly initiate: (
      input: InitiatePaymentInput
    ) => Effect.Effect<PaymentInitiation, InitiatePaymentError>

    readonly getStatus: (orderId: OrderId) => Effect.Effect<Order, OrderNotFoundError | SqlError.SqlError>
  }
>() {}
