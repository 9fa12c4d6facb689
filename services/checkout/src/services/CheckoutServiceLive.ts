import { Layer, Effect, Option, Schema } from "effect"
import { CheckoutService, type CheckoutInput, type CheckoutLine } from "./CheckoutService.js"
import { StockLedger } from "./StockLedger.js"
import { OrderStore } from "./OrderStore.js"
import { DeliveryFeeEstimator } from "./DeliveryFeeEstimator.js"
import { CatalogRepository } from "../repositories/CatalogRepository.js"
import { UnitOfWork } from "../repositories/UnitOfWork.js"
import {
  DeliveryDestination,
  OrderItem,
  OrderNumber,
  Recipient,
  generateOrderNumber,
  type Customer,
  type NewOrder,
  type OrderFilter,
  type UserId
} from "../domain/Order.js"
import { ProductId, discountedPriceCents, type Product } from "../domain/Product.js"
import { normalizePhoneNumber } from "../domain/Phone.js"
import { OrderNotFoundError, ValidationError, type FieldIssue } from "../domain/errors.js"

export const MAX_LINE_QUANTITY = 100

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/

interface ResolvedLine {
  readonly product: Product
  readonly quantity: number
  // Index of the first request line for this product, for error reporting
  readonly index: number
}

const fail = (issues: ReadonlyArray<FieldIssue>) => Effect.fail(new ValidationError({ issues }))

// Step 2: every product exists and is on sale
const resolveProducts = (
  items: ReadonlyArray<CheckoutLine>,
  catalog: ReadonlyMap<string, Product>
) => {
  const issues: FieldIssue[] = []
  const resolved: Array<{ product: Product; quantity: number; index: number }> = []

  items.forEach((item, index) => {
    const product = Option.fromNullable(catalog.get(item.productId))
    if (Option.isNone(product)) {
      issues.push({ field: `items[${index}].product_id`, message: "Product not found" })
    } else if (!product.value.isActive) {
      issues.push({
        field: `items[${index}].product_id`,
        message: `${product.value.name} is no longer available`
      })
    } else {
      resolved.push({ product: product.value, quantity: item.quantity, index })
    }
  })

  return { issues, resolved }
}

// Step 3: quantity bounds, per request line and per merged product
const mergeLines = (lines: ReadonlyArray<ResolvedLine>) => {
  const issues: FieldIssue[] = []
  lines.forEach((line) => {
    if (!Number.isInteger(line.quantity) || line.quantity < 1 || line.quantity > MAX_LINE_QUANTITY) {
      issues.push({
        field: `items[${line.index}].quantity`,
        message: `Quantity must be between 1 and ${MAX_LINE_QUANTITY}`
      })
    }
  })
  if (issues.length > 0) {
    return { issues, merged: [] }
  }

  const byProduct = new Map<string, ResolvedLine>()
  for (const line of lines) {
    const existing = byProduct.get(line.product.id)
    byProduct.set(
      line.product.id,
      existing ? { ...existing, quantity: existing.quantity + line.quantity } : line
    )
  }
  const merged = [...byProduct.values()]
  for (const line of merged) {
    if (line.quantity > MAX_LINE_QUANTITY) {
      issues.push({
        field: `items[${line.index}].quantity`,
        message: `Total quantity of ${line.product.name} cannot exceed ${MAX_LINE_QUANTITY}`
      })
    }
  }
  return { issues, merged }
}

// Step 4: exactly one of authenticated user / guest contact
const resolveCustomer = (input: CheckoutInput) => {
  const issues: FieldIssue[] = []
  const phone = normalizePhoneNumber(input.recipientPhone)
  if (Option.isNone(phone)) {
    issues.push({
      field: "recipient_phone",
      message: "Enter a valid Kenyan mobile number, e.g. 0712345678"
    })
  }

  let customer: Option.Option<Customer> = Option.none()
  if (Option.isSome(input.userId)) {
    if (Option.isSome(input.guestEmail)) {
      issues.push({ field: "guest_email", message: "Signed-in customers cannot check out as a guest" })
    } else {
      customer = Option.some<Customer>({ _tag: "Registered", userId: input.userId.value })
    }
  } else {
    const email = Option.map(input.guestEmail, (value) => value.trim())
    if (Option.isNone(email) || email.value.length === 0) {
      issues.push({ field: "guest_email", message: "Email is required for guest checkout" })
    } else if (!EMAIL_PATTERN.test(email.value) || email.value.length > 254) {
      issues.push({ field: "guest_email", message: "Invalid email format" })
    } else if (Option.isSome(phone)) {
      customer = Option.some<Customer>({ _tag: "Guest", email: email.value.toLowerCase(), phone: phone.value })
    }
  }

  return { issues, customer, phone }
}

export const CheckoutServiceLive = Layer.effect(
  CheckoutService,
  Effect.gen(function* () {
    const catalog = yield* CatalogRepository
    const stockLedger = yield* StockLedger
    const orderStore = yield* OrderStore
    const deliveryFees = yield* DeliveryFeeEstimator
    const unitOfWork = yield* UnitOfWork

    return {
      checkout: (input: CheckoutInput) =>
        Effect.gen(function* () {
          // 1. Cart must not be empty
          if (input.items.length === 0) {
            return yield* fail([{ field: "items", message: "Cart is empty" }])
          }

          // 2. Products exist and are active
          const ids = input.items.flatMap((item) =>
            Option.toArray(Schema.decodeUnknownOption(ProductId)(item.productId))
          )
          const products = yield* catalog.findByIds([...new Set(ids)])
          const byId = new Map(products.map((product) => [product.id, product]))
          const { issues: productIssues, resolved } = resolveProducts(input.items, byId)
          if (productIssues.length > 0) {
            return yield* fail(productIssues)
          }

          // 3. Quantities
          const { issues: quantityIssues, merged } = mergeLines(resolved)
          if (quantityIssues.length > 0) {
            return yield* fail(quantityIssues)
          }

          // 4. Customer contact
          const contact = resolveCustomer(input)
          if (contact.issues.length > 0 || Option.isNone(contact.customer) || Option.isNone(contact.phone)) {
            return yield* fail(contact.issues)
          }

          // Pricing snapshot
          const items = merged.map((line) => {
            const unitPriceCents = discountedPriceCents(line.product)
            return new OrderItem({
              productId: line.product.id,
              productName: line.product.name,
              productSku: line.product.sku,
              unitPriceCents,
              quantity: line.quantity,
              lineTotalCents: unitPriceCents * line.quantity
            })
          })
          const destination = new DeliveryDestination({
            address: input.deliveryAddress.trim(),
            city: input.deliveryCity.trim(),
            postalCode: input.deliveryPostalCode
          })
          const subtotalCents = items.reduce((sum, item) => sum + item.lineTotalCents, 0)
          const deliveryFeeCents = yield* deliveryFees.estimate(destination)

          const newOrder: NewOrder = {
            orderNumber: yield* generateOrderNumber,
            customer: contact.customer.value,
            destination,
            recipient: new Recipient({ name: input.recipientName.trim(), phone: contact.phone.value }),
            notes: input.notes,
            items,
            subtotalCents,
            deliveryFeeCents,
            totalCents: subtotalCents + deliveryFeeCents
          }

          const order = yield* unitOfWork.transaction(
            Effect.gen(function* () {
              yield* stockLedger.reserveAll(
                items.map((item) => ({ productId: item.productId, quantity: item.quantity }))
              )
              return yield* orderStore.create(newOrder)
            })
          )

          yield* Effect.logInfo("Order created", {
            orderId: order.id,
            orderNumber: order.orderNumber,
            customer: order.customer._tag,
            lines: order.items.length,
            totalCents: order.totalCents
          })
          return order
        }).pipe(Effect.withSpan("CheckoutService.checkout")),

      findOrder: (orderNumber: string) =>
        Schema.decodeUnknown(OrderNumber)(orderNumber).pipe(
          Effect.mapError(() => new OrderNotFoundError({ orderId: orderNumber, searchedBy: "orderNumber" })),
          Effect.flatMap(orderStore.getByNumber)
        ),

      listOrders: (userId: UserId, filter: OrderFilter) =>
        orderStore.listForUser(userId, filter).pipe(
          Effect.tap((orders) => Effect.logDebug("Listed customer orders", { userId, count: orders.length })),
          Effect.withSpan("CheckoutService.listOrders")
        )
    }
  })
)
