import { DateTime, Either, Match } from "effect"
import type { Order, OrderStatus, PaymentStatus } from "./Order.js"
import { ConsistencyViolation } from "./errors.js"

/**
 * Valid order status transitions. `cancelled` is reachable only before
 * fulfilment starts.
 */
export const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  pending: ["confirmed", "cancelled"],
  confirmed: ["processing", "cancelled"],
  processing: ["shipped"],
  shipped: ["delivered"],
  delivered: [], // Terminal state
  cancelled: [] // Terminal state
}

/**
 * Valid payment status transitions. `failed -> unpaid` happens only when a
 * customer retries and the reservation has been renewed.
 */
export const PAYMENT_TRANSITIONS: Record<PaymentStatus, readonly PaymentStatus[]> = {
  unpaid: ["pending"],
  pending: ["paid", "failed"],
  paid: ["refunded"],
  failed: ["unpaid"],
  refunded: [] // Terminal state
}

export const isValidOrderTransition = (from: OrderStatus, to: OrderStatus): boolean =>
  from === to || ORDER_TRANSITIONS[from].includes(to)

export const isValidPaymentTransition = (from: PaymentStatus, to: PaymentStatus): boolean =>
  from === to || PAYMENT_TRANSITIONS[from].includes(to)

export type OrderEvent =
  | { readonly _tag: "PaymentInitiated" }
  | { readonly _tag: "PaymentSucceeded"; readonly paidAt: DateTime.Utc }
  | { readonly _tag: "PaymentFailed"; readonly maxAttempts: number }
  | { readonly _tag: "ReservationRenewed" }

export interface StatusPair {
  readonly orderStatus: OrderStatus
  readonly paymentStatus: PaymentStatus
}

/**
 * A decided transition: the compare-and-swap source, the target and the
 * fields that change with it.
 */
export interface Transition {
  readonly from: StatusPair
  readonly to: StatusPair
  readonly paidAt: DateTime.Utc | null
  readonly failedPaymentAttempts: number
}

const reject = (order: Order, event: OrderEvent, reason: string) =>
  Either.left(
    new ConsistencyViolation({
      entity: "order",
      entityId: order.id,
      attempted: event._tag,
      reason
    })
  )

const expect = (
  order: Order,
  event: OrderEvent,
  required: StatusPair,
  to: StatusPair,
  fields: { paidAt?: DateTime.Utc; failedPaymentAttempts?: number } = {}
): Either.Either<Transition, ConsistencyViolation> => {
  if (order.orderStatus !== required.orderStatus || order.paymentStatus !== required.paymentStatus) {
    return reject(
      order,
      event,
      `expected ${required.orderStatus}/${required.paymentStatus}, found ${order.orderStatus}/${order.paymentStatus}`
    )
  }
  if (
    !isValidOrderTransition(required.orderStatus, to.orderStatus) ||
    !isValidPaymentTransition(required.paymentStatus, to.paymentStatus)
  ) {
    return reject(
      order,
      event,
      `${required.orderStatus}/${required.paymentStatus} -> ${to.orderStatus}/${to.paymentStatus} is not a valid transition`
    )
  }
  return Either.right({
    from: required,
    to,
    paidAt: fields.paidAt ?? order.paidAt,
    failedPaymentAttempts: fields.failedPaymentAttempts ?? order.failedPaymentAttempts
  })
}

/**
 * Decide the status change an event causes on an order. Every order and
 * payment status change goes through here.
 */
export const decideTransition = (
  order: Order,
  event: OrderEvent
): Either.Either<Transition, ConsistencyViolation> =>
  Match.value(event).pipe(
    Match.tag("PaymentInitiated", () =>
      expect(
        order,
        event,
        { orderStatus: "pending", paymentStatus: "unpaid" },
        { orderStatus: "pending", paymentStatus: "pending" }
      )
    ),
    Match.tag("PaymentSucceeded", ({ paidAt }) =>
      expect(
        order,
        event,
        { orderStatus: "pending", paymentStatus: "pending" },
        { orderStatus: "confirmed", paymentStatus: "paid" },
        { paidAt }
      )
    ),
    Match.tag("PaymentFailed", ({ maxAttempts }) => {
      const failedPaymentAttempts = order.failedPaymentAttempts + 1
      return expect(
        order,
        event,
        { orderStatus: "pending", paymentStatus: "pending" },
        {
          orderStatus: failedPaymentAttempts >= maxAttempts ? "cancelled" : "pending",
          paymentStatus: "failed"
        },
        { failedPaymentAttempts }
      )
    }),
    Match.tag("ReservationRenewed", () =>
      expect(
        order,
        event,
        { orderStatus: "pending", paymentStatus: "failed" },
        { orderStatus: "pending", paymentStatus: "unpaid" }
      )
    ),
    Match.exhaustive
  )
