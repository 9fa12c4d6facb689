import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type { Order, OrderFilter, UserId } from "../domain/Order.js"
import type {
  ConsistencyViolation,
  InsufficientStockError,
  OrderNotFoundError,
  ProductNotFoundError,
  ValidationError
} from "../domain/errors.js"

export interface CheckoutLine {
  readonly productId: string
  readonly quantity: number
}

export interface CheckoutInput {
  readonly items: ReadonlyArray<CheckoutLine>
  readonly deliveryAddress: string
  readonly deliveryCity: string
  readonly deliveryPostalCode: string | null
  readonly recipientName: string
  readonly recipientPhone: string
  readonly notes: string | null
  // Present when an authenticated customer checks out
  readonly userId: Option.Option<UserId>
  readonly guestEmail: Option.Option<string>
}

export type CheckoutError =
  | ValidationError
  | InsufficientStockError
  | ProductNotFoundError
  | ConsistencyViolation
  | SqlError.SqlError

export class CheckoutService extends Context.Tag("CheckoutService")<
  CheckoutService,
  {
    /**
     * Validates and prices the cart, then reserves stock and creates the
     * order (pending/unpaid) as one atomic unit.
     */
    readonly checkout: (input: CheckoutInput) => Effect.Effect<Order, CheckoutError>

    readonly findOrder: (
      orderNumber: string
    ) => Effect.Effect<Order, OrderNotFoundError | SqlError.SqlError>

    // A signed-in customer's orders, newest first
    readonly listOrders: (
      userId: UserId,
      filter: OrderFilter
    ) => Effect.Effect<ReadonlyArray<Order>, SqlError.SqlError>
  }
>() {}
