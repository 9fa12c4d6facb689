import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type { NewOrder, Order, OrderFilter, OrderId, OrderNumber, UserId } from "../domain/Order.js"
import type { Transition } from "../domain/OrderState.js"

export class OrderRepository extends Context.Tag("OrderRepository")<
  OrderRepository,
  {
    /**
     * Inserts an order and its item snapshots as pending/unpaid.
     * Callers wrap this in the unit of work that also holds the reservations.
     */
    readonly insert: (order: NewOrder) => Effect.Effect<Order, SqlError.SqlError>

    /**
     * Finds an order (with items) by its ID.
     * Returns Option.none() if not found.
     */
    readonly findById: (id: OrderId) => Effect.Effect<Option.Option<Order>, SqlError.SqlError>

    readonly findByNumber: (
      orderNumber: OrderNumber
    ) => Effect.Effect<Option.Option<Order>, SqlError.SqlError>

    /**
     * Like findById, but the order row stays locked until the surrounding
     * transaction ends.
     */
    readonly findByIdForUpdate: (id: OrderId) => Effect.Effect<Option.Option<Order>, SqlError.SqlError>

    // Newest first
    readonly listByUser: (
      userId: UserId,
      filter: OrderFilter
    ) => Effect.Effect<ReadonlyArray<Order>, SqlError.SqlError>

    /**
     * Compare-and-swap on (order_status, payment_status). Returns
     * Option.none() when the stored statuses no longer match transition.from.
     */
    readonly applyTransition: (
      id: OrderId,
      transition: Transition
    ) => Effect.Effect<Option.Option<Order>, SqlError.SqlError>
  }
>() {}
