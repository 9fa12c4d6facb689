import { Context, Effect } from "effect"
import { SqlError } from "@effect/sql"
import type { NewOrder, Order, OrderFilter, OrderId, OrderNumber, UserId } from "../domain/Order.js"
import type { OrderEvent } from "../domain/OrderState.js"
import type { ConsistencyViolation, OrderNotFoundError } from "../domain/errors.js"

export class OrderStore extends Context.Tag("OrderStore")<
  OrderStore,
  {
    readonly create: (order: NewOrder) => Effect.Effect<Order, SqlError.SqlError>

    readonly get: (id: OrderId) => Effect.Effect<Order, OrderNotFoundError | SqlError.SqlError>

    readonly getByNumber: (
      orderNumber: OrderNumber
    ) => Effect.Effect<Order, OrderNotFoundError | SqlError.SqlError>

    /**
     * Reads the order and holds it until the surrounding unit of work ends,
     * so no other writer can act on the statuses it returns.
     */
    readonly getForUpdate: (id: OrderId) => Effect.Effect<Order, OrderNotFoundError | SqlError.SqlError>

    readonly listForUser: (
      userId: UserId,
      filter: OrderFilter
    ) => Effect.Effect<ReadonlyArray<Order>, SqlError.SqlError>

    /**
     * Applies an event to the order as decided by decideTransition, with a
     * compare-and-swap on the statuses the decision was made from.
     */
    readonly transition: (
      order: Order,
      event: OrderEvent
    ) => Effect.Effect<Order, ConsistencyViolation | SqlError.SqlError>
  }
>() {}
