import { DateTime, Effect, type Option, Random, Schema } from "effect"
import { ProductId } from "./Product.js"
import { PhoneNumber } from "./Phone.js"
import { compactTimestamp } from "./Timestamp.js"

export const OrderId = Schema.UUID.pipe(Schema.brand("OrderId"))
export type OrderId = typeof OrderId.Type

// ORD-<UTC timestamp>-<4 random base-36 characters>
export const OrderNumber = Schema.String.pipe(
  Schema.pattern(/^ORD-\d{14}-[0-9A-Z]{4}$/),
  Schema.brand("OrderNumber")
)
export type OrderNumber = typeof OrderNumber.Type

// Identity asserted by the upstream auth gateway
export const UserId = Schema.NonEmptyTrimmedString.pipe(
  Schema.maxLength(64),
  Schema.brand("UserId")
)
export type UserId = typeof UserId.Type

export const OrderStatus = Schema.Literal(
  "pending",
  "confirmed",
  "processing",
  "shipped",
  "delivered",
  "cancelled"
)
export type OrderStatus = typeof OrderStatus.Type

export const PaymentStatus = Schema.Literal("unpaid", "pending", "paid", "failed", "refunded")
export type PaymentStatus = typeof PaymentStatus.Type

export const RegisteredCustomer = Schema.TaggedStruct("Registered", {
  userId: UserId
})

export const GuestCustomer = Schema.TaggedStruct("Guest", {
  email: Schema.String,
  phone: PhoneNumber
})

export const Customer = Schema.Union(RegisteredCustomer, GuestCustomer)
export type Customer = typeof Customer.Type

// Price and identity snapshot taken at checkout; never re-read from the catalog
export class OrderItem extends Schema.Class<OrderItem>("OrderItem")({
  productId: ProductId,
  productName: Schema.String,
  productSku: Schema.String,
  unitPriceCents: Schema.Int.pipe(Schema.nonNegative()),
  quantity: Schema.Int.pipe(Schema.between(1, 100)),
  lineTotalCents: Schema.Int.pipe(Schema.nonNegative())
}) {}

export class DeliveryDestination extends Schema.Class<DeliveryDestination>("DeliveryDestination")({
  address: Schema.String,
  city: Schema.String,
  postalCode: Schema.NullOr(Schema.String)
}) {}

export class Recipient extends Schema.Class<Recipient>("Recipient")({
  name: Schema.String,
  phone: PhoneNumber
}) {}

export class Order extends Schema.Class<Order>("Order")({
  id: OrderId,
  orderNumber: OrderNumber,
  customer: Customer,
  destination: DeliveryDestination,
  recipient: Recipient,
  notes: Schema.NullOr(Schema.String),
  items: Schema.Array(OrderItem),
  subtotalCents: Schema.Int.pipe(Schema.nonNegative()),
  deliveryFeeCents: Schema.Int.pipe(Schema.nonNegative()),
  totalCents: Schema.Int.pipe(Schema.nonNegative()),
  orderStatus: OrderStatus,
  paymentStatus: PaymentStatus,
  failedPaymentAttempts: Schema.Int.pipe(Schema.nonNegative()),
  createdAt: Schema.DateTimeUtc,
  updatedAt: Schema.DateTimeUtc,
  paidAt: Schema.NullOr(Schema.DateTimeUtc),
  shippedAt: Schema.NullOr(Schema.DateTimeUtc),
  deliveredAt: Schema.NullOr(Schema.DateTimeUtc)
}) {}

// Fields the repository needs to persist a freshly priced order
export interface NewOrder {
  readonly orderNumber: OrderNumber
  readonly customer: Customer
  readonly destination: DeliveryDestination
  readonly recipient: Recipient
  readonly notes: string | null
  readonly items: ReadonlyArray<OrderItem>
  readonly subtotalCents: number
  readonly deliveryFeeCents: number
  readonly totalCents: number
}

// Optional status filters for a customer's order history
export interface OrderFilter {
  readonly orderStatus: Option.Option<OrderStatus>
  readonly paymentStatus: Option.Option<PaymentStatus>
}

// Request schemas for API input. Business rules (quantity bounds, product
// lookups, guest contact) are checked by the checkout service so that
// every issue can be reported against its field.
export class CheckoutLineRequest extends Schema.Class<CheckoutLineRequest>("CheckoutLineRequest")({
  product_id: Schema.String,
  quantity: Schema.Int
}) {}

export class CheckoutRequest extends Schema.Class<CheckoutRequest>("CheckoutRequest")({
  items: Schema.Array(CheckoutLineRequest),
  delivery_address: Schema.String.pipe(
    Schema.minLength(1, { message: () => "Delivery address is required" })
  ),
  delivery_city: Schema.String.pipe(
    Schema.minLength(1, { message: () => "Delivery city is required" })
  ),
  delivery_postal_code: Schema.optional(Schema.String),
  recipient_name: Schema.String.pipe(
    Schema.minLength(1, { message: () => "Recipient name is required" })
  ),
  recipient_phone: Schema.String,
  guest_email: Schema.optional(Schema.String),
  customer_notes: Schema.optional(Schema.String)
}) {}

export const OrderNumberParams = Schema.Struct({
  order_number: Schema.String
})

export const OrderIdParams = Schema.Struct({
  order_id: OrderId
})

export const OrderHistoryQuery = Schema.Struct({
  order_status: Schema.optional(OrderStatus),
  payment_status: Schema.optional(PaymentStatus)
})

const ORDER_NUMBER_ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ"

export const formatOrderNumber = (at: DateTime.Utc, suffix: string): OrderNumber =>
  OrderNumber.make(`ORD-${compactTimestamp(at)}-${suffix}`)

export const generateOrderNumber: Effect.Effect<OrderNumber> = Effect.gen(function* () {
  const now = yield* DateTime.now
  let suffix = ""
  for (let i = 0; i < 4; i++) {
    const index = yield* Random.nextIntBetween(0, ORDER_NUMBER_ALPHABET.length)
    suffix += ORDER_NUMBER_ALPHABET[index]
  }
  return formatOrderNumber(now, suffix)
})
