import { DateTime, Match } from "effect"
import type { Order } from "../domain/Order.js"
import { formatCents } from "../domain/Money.js"
import type { FieldIssue } from "../domain/errors.js"

export const CURRENCY = "KES"

const isoOrNull = (value: DateTime.Utc | null) => (value ? DateTime.formatIso(value) : null)

// snake_case order representation shared by checkout and order lookup
export const orderResponse = (order: Order) => ({
  order_id: order.id,
  order_number: order.orderNumber,
  order_status: order.orderStatus,
  payment_status: order.paymentStatus,
  customer: Match.value(order.customer).pipe(
    Match.tag("Registered", ({ userId }) => ({ type: "registered", user_id: userId })),
    Match.tag("Guest", ({ email, phone }) => ({ type: "guest", email, phone })),
    Match.exhaustive
  ),
  delivery: {
    address: order.destination.address,
    city: order.destination.city,
    postal_code: order.destination.postalCode
  },
  recipient: {
    name: order.recipient.name,
    phone: order.recipient.phone
  },
  notes: order.notes,
  items: order.items.map((item) => ({
    product_id: item.productId,
    product_name: item.productName,
    product_sku: item.productSku,
    unit_price: formatCents(item.unitPriceCents),
    quantity: item.quantity,
    line_total: formatCents(item.lineTotalCents)
  })),
  subtotal: formatCents(order.subtotalCents),
  delivery_fee: formatCents(order.deliveryFeeCents),
  total_amount: formatCents(order.totalCents),
  currency: CURRENCY,
  created_at: DateTime.formatIso(order.createdAt),
  paid_at: isoOrNull(order.paidAt)
})

// Order history entry; items are summarised by count
export const orderSummaryResponse = (order: Order) => ({
  order_id: order.id,
  order_number: order.orderNumber,
  order_status: order.orderStatus,
  payment_status: order.paymentStatus,
  delivery_city: order.destination.city,
  item_count: order.items.reduce((count, item) => count + item.quantity, 0),
  subtotal: formatCents(order.subtotalCents),
  delivery_fee: formatCents(order.deliveryFeeCents),
  total_amount: formatCents(order.totalCents),
  currency: CURRENCY,
  created_at: DateTime.formatIso(order.createdAt)
})

export const validationBody = (issues: ReadonlyArray<FieldIssue>) => ({
  error: "validation_error",
  message: issues.map((issue) => issue.message).join("; "),
  issues: issues.map((issue) => ({ field: issue.field, message: issue.message }))
})
