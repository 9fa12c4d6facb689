import { Layer, Effect, Either, Option } from "effect"
import { OrderStore } from "./OrderStore.js"
import { OrderRepository } from "../repositories/OrderRepository.js"
import { decideTransition, type OrderEvent } from "../domain/OrderState.js"
import { ConsistencyViolation, OrderNotFoundError } from "../domain/errors.js"
import type { NewOrder, Order, OrderFilter, OrderId, OrderNumber, UserId } from "../domain/Order.js"

const rejectTransition = (violation: ConsistencyViolation) =>
  Effect.gen(function* () {
    yield* Effect.logError("Rejected order transition", {
      orderId: violation.entityId,
      attempted: violation.attempted,
      reason: violation.reason
    })
    return yield* Effect.fail(violation)
  })

export const OrderStoreLive = Layer.effect(
  OrderStore,
  Effect.gen(function* () {
    const repo = yield* OrderRepository

    const requireFound = (id: OrderId) =>
      Effect.flatMap(
        Option.match({
          onNone: () => Effect.fail(new OrderNotFoundError({ orderId: id, searchedBy: "id" })),
          onSome: (order: Order) => Effect.succeed(order)
        })
      )

    return {
      create: (order: NewOrder) => repo.insert(order),

      get: (id: OrderId) => repo.findById(id).pipe(requireFound(id)),

      getForUpdate: (id: OrderId) => repo.findByIdForUpdate(id).pipe(requireFound(id)),

      listForUser: (userId: UserId, filter: OrderFilter) => repo.listByUser(userId, filter),

      getByNumber: (orderNumber: OrderNumber) =>
        repo.findByNumber(orderNumber).pipe(
          Effect.flatMap(
            Option.match({
              onNone: () =>
                Effect.fail(new OrderNotFoundError({ orderId: orderNumber, searchedBy: "orderNumber" })),
              onSome: Effect.succeed
            })
          )
        ),

      transition: (order: Order, event: OrderEvent) =>
        Effect.gen(function* () {
          const decision = decideTransition(order, event)
          if (Either.isLeft(decision)) {
            return yield* rejectTransition(decision.left)
          }
          const transition = decision.right

          const updated = yield* repo.applyTransition(order.id, transition)
          if (Option.isNone(updated)) {
            // Someone else moved the order since it was read
            return yield* rejectTransition(
              new ConsistencyViolation({
                entity: "order",
                entityId: order.id,
                attempted: event._tag,
                reason: `order is no longer ${transition.from.orderStatus}/${transition.from.paymentStatus}`
              })
            )
          }

          yield* Effect.logInfo("Order transitioned", {
            orderId: order.id,
            event: event._tag,
            orderStatus: `${transition.from.orderStatus} -> ${transition.to.orderStatus}`,
            paymentStatus: `${transition.from.paymentStatus} -> ${transition.to.paymentStatus}`
          })
          return updated.value
        }).pipe(Effect.withSpan("OrderStore.transition", { attributes: { orderId: order.id, event: event._tag } }))
    }
  })
)
