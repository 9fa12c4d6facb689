import { Layer, Effect, Option, DateTime, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { OrderRepository } from "./OrderRepository.js"
import {
  DeliveryDestination,
  Order,
  OrderId,
  OrderItem,
  OrderNumber,
  OrderStatus,
  PaymentStatus,
  Recipient,
  UserId,
  type Customer,
  type NewOrder,
  type OrderFilter
} from "../domain/Order.js"
import { ProductId } from "../domain/Product.js"
import { PhoneNumber } from "../domain/Phone.js"
import type { Transition } from "../domain/OrderState.js"

// Database row types (snake_case)
interface OrderRow {
  id: string
  order_number: string
  user_id: string | null
  guest_email: string | null
  guest_phone: string | null
  delivery_address: string
  delivery_city: string
  delivery_postal_code: string | null
  recipient_name: string
  recipient_phone: string
  customer_notes: string | null
  subtotal_cents: number
  delivery_fee_cents: number
  total_cents: number
  order_status: string
  payment_status: string
  failed_payment_attempts: number
  created_at: Date
  updated_at: Date
  paid_at: Date | null
  shipped_at: Date | null
  delivered_at: Date | null
}

interface OrderItemRow {
  order_id: string
  position: number
  product_id: string
  product_name: string
  product_sku: string
  unit_price_cents: number
  quantity: number
  line_total_cents: number
}

const optionalDateTime = (value: Date | null) => (value ? DateTime.unsafeFromDate(value) : null)

const mapRowToCustomer = (row: OrderRow): Customer =>
  row.user_id !== null
    ? { _tag: "Registered", userId: Schema.decodeUnknownSync(UserId)(row.user_id) }
    : {
        _tag: "Guest",
        email: row.guest_email ?? "",
        phone: Schema.decodeUnknownSync(PhoneNumber)(row.guest_phone)
      }

const mapRowToOrderItem = (row: OrderItemRow): OrderItem =>
  new OrderItem({
    productId: Schema.decodeUnknownSync(ProductId)(row.product_id),
    productName: row.product_name,
    productSku: row.product_sku,
    unitPriceCents: row.unit_price_cents,
    quantity: row.quantity,
    lineTotalCents: row.line_total_cents
  })

const mapRowToOrder = (row: OrderRow, itemRows: ReadonlyArray<OrderItemRow>): Order =>
  new Order({
    id: Schema.decodeUnknownSync(OrderId)(row.id),
    orderNumber: Schema.decodeUnknownSync(OrderNumber)(row.order_number),
    customer: mapRowToCustomer(row),
    destination: new DeliveryDestination({
      address: row.delivery_address,
      city: row.delivery_city,
      postalCode: row.delivery_postal_code
    }),
    recipient: new Recipient({
      name: row.recipient_name,
      phone: Schema.decodeUnknownSync(PhoneNumber)(row.recipient_phone)
    }),
    notes: row.customer_notes,
    items: [...itemRows].sort((a, b) => a.position - b.position).map(mapRowToOrderItem),
    subtotalCents: row.subtotal_cents,
    deliveryFeeCents: row.delivery_fee_cents,
    totalCents: row.total_cents,
    orderStatus: Schema.decodeUnknownSync(OrderStatus)(row.order_status),
    paymentStatus: Schema.decodeUnknownSync(PaymentStatus)(row.payment_status),
    failedPaymentAttempts: row.failed_payment_attempts,
    createdAt: DateTime.unsafeFromDate(row.created_at),
    updatedAt: DateTime.unsafeFromDate(row.updated_at),
    paidAt: optionalDateTime(row.paid_at),
    shippedAt: optionalDateTime(row.shipped_at),
    deliveredAt: optionalDateTime(row.delivered_at)
  })

export const OrderRepositoryLive = Layer.effect(
  OrderRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    const withItems = (rows: ReadonlyArray<OrderRow>) =>
      Effect.gen(function* () {
        if (rows.length === 0) {
          return Option.none<Order>()
        }
        const itemRows = yield* sql<OrderItemRow>`
          SELECT * FROM order_items WHERE order_id = ${rows[0].id}::uuid
        `
        return Option.some(mapRowToOrder(rows[0], itemRows))
      })

    return {
      insert: (order: NewOrder) =>
        Effect.gen(function* () {
          const userId = order.customer._tag === "Registered" ? order.customer.userId : null
          const guestEmail = order.customer._tag === "Guest" ? order.customer.email : null
          const guestPhone = order.customer._tag === "Guest" ? order.customer.phone : null

          const orderRows = yield* sql<OrderRow>`
            INSERT INTO orders (
              order_number,
              user_id,
              guest_email,
              guest_phone,
              delivery_address,
              delivery_city,
              delivery_postal_code,
              recipient_name,
              recipient_phone,
              customer_notes,
              subtotal_cents,
              delivery_fee_cents,
              total_cents,
              order_status,
              payment_status
            )
            VALUES (
              ${order.orderNumber},
              ${userId},
              ${guestEmail},
              ${guestPhone},
              ${order.destination.address},
              ${order.destination.city},
              ${order.destination.postalCode},
              ${order.recipient.name},
              ${order.recipient.phone},
              ${order.notes},
              ${order.subtotalCents},
              ${order.deliveryFeeCents},
              ${order.totalCents},
              'pending',
              'unpaid'
            )
            RETURNING *
          `
          const orderRow = orderRows[0]

          const itemRows: OrderItemRow[] = []
          for (const [position, item] of order.items.entries()) {
            const inserted = yield* sql<OrderItemRow>`
              INSERT INTO order_items (
                order_id, position, product_id, product_name, product_sku,
                unit_price_cents, quantity, line_total_cents
              )
              VALUES (
                ${orderRow.id}::uuid, ${position}, ${item.productId}::uuid, ${item.productName},
                ${item.productSku}, ${item.unitPriceCents}, ${item.quantity}, ${item.lineTotalCents}
              )
              RETURNING *
            `
            itemRows.push(inserted[0])
          }

          return mapRowToOrder(orderRow, itemRows)
        }),

      findById: (id: OrderId) =>
        Effect.gen(function* () {
          const rows = yield* sql<OrderRow>`
            SELECT * FROM orders WHERE id = ${id}::uuid
          `
          return yield* withItems(rows)
        }),

      findByNumber: (orderNumber: OrderNumber) =>
        Effect.gen(function* () {
          const rows = yield* sql<OrderRow>`
            SELECT * FROM orders WHERE order_number = ${orderNumber}
          `
          return yield* withItems(rows)
        }),

      findByIdForUpdate: (id: OrderId) =>
        Effect.gen(function* () {
          const rows = yield* sql<OrderRow>`
            SELECT * FROM orders WHERE id = ${id}::uuid FOR UPDATE
          `
          return yield* withItems(rows)
        }),

      listByUser: (userId: UserId, filter: OrderFilter) =>
        Effect.gen(function* () {
          const orderStatus = Option.getOrNull(filter.orderStatus)
          const paymentStatus = Option.getOrNull(filter.paymentStatus)
          const rows = yield* sql<OrderRow>`
            SELECT * FROM orders
            WHERE user_id = ${userId}
              AND (${orderStatus}::text IS NULL OR order_status = ${orderStatus})
              AND (${paymentStatus}::text IS NULL OR payment_status = ${paymentStatus})
            ORDER BY created_at DESC
          `
          if (rows.length === 0) {
            return []
          }
          const itemRows = yield* sql<OrderItemRow>`
            SELECT * FROM order_items WHERE order_id = ANY(${rows.map((row) => row.id)}::uuid[])
          `
          return rows.map((row) =>
            mapRowToOrder(row, itemRows.filter((item) => item.order_id === row.id))
          )
        }),

      applyTransition: (id: OrderId, transition: Transition) =>
        Effect.gen(function* () {
          const paidAt = transition.paidAt ? DateTime.toDate(transition.paidAt) : null
          const rows = yield* sql<OrderRow>`
            UPDATE orders
            SET order_status = ${transition.to.orderStatus},
                payment_status = ${transition.to.paymentStatus},
                paid_at = ${paidAt},
                failed_payment_attempts = ${transition.failedPaymentAttempts},
                updated_at = NOW()
            WHERE id = ${id}::uuid
              AND order_status = ${transition.from.orderStatus}
              AND payment_status = ${transition.from.paymentStatus}
            RETURNING *
          `
          return yield* withItems(rows)
        })
    }
  })
)
