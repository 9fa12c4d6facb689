import { describe, it, expect } from "vitest"
import { Effect, Either, Option, Schema } from "effect"
import { SqlError } from "@effect/sql"
import { CheckoutService } from "../services/CheckoutService.js"
import { UserId } from "../domain/Order.js"
import type { FieldIssue } from "../domain/errors.js"
import {
  alternatorId,
  brakePadsId,
  checkoutInput,
  retiredPartId,
  runWithHarness,
  unknownProductId,
  wiperBladeId
} from "./support/fixtures.js"
import type { CheckoutInput } from "../services/CheckoutService.js"

const testUserId = Schema.decodeUnknownSync(UserId)("user-42")

// Runs a checkout that must fail validation and returns its issues
const validationIssues = (input: CheckoutInput) =>
  runWithHarness(() =>
    Effect.gen(function* () {
      const checkout = yield* CheckoutService
      const result = yield* Effect.either(checkout.checkout(input))
      if (Either.isLeft(result) && result.left._tag === "ValidationError") {
        return result.left.issues
      }
      return yield* Effect.dieMessage("expected a ValidationError")
    })
  )

const issue = (field: string, message: string): FieldIssue => ({ field, message })

describe("CheckoutService", () => {
  describe("successful checkout", () => {
    it("should price the cart, add delivery and reserve stock", async () => {
      const { order, brake, alt } = await runWithHarness(({ store }) =>
        Effect.gen(function* () {
          const checkout = yield* CheckoutService
          const order = yield* checkout.checkout(checkoutInput())
          return {
            order,
            brake: yield* store.product(brakePadsId),
            alt: yield* store.product(alternatorId)
          }
        })
      )

      expect(order.subtotalCents).toBe(540000)
      expect(order.deliveryFeeCents).toBe(30000)
      expect(order.totalCents).toBe(570000)
      expect(order.orderStatus).toBe("pending")
      expect(order.paymentStatus).toBe("unpaid")
      expect(order.orderNumber).toMatch(/^ORD-\d{14}-[0-9A-Z]{4}$/)
      expect(order.items.map((item) => [item.productSku, item.quantity, item.lineTotalCents])).toEqual([
        ["BRK-PAD-001", 2, 190000],
        ["ALT-12V-090", 1, 350000]
      ])
      expect(brake.reservedStock).toBe(2)
      expect(brake.stock).toBe(10)
      expect(alt.reservedStock).toBe(1)
    })

    it("should normalize guest contact details", async () => {
      const order = await runWithHarness(() =>
        Effect.gen(function* () {
          const checkout = yield* CheckoutService
          return yield* checkout.checkout(checkoutInput({
            guestEmail: Option.some("  Buyer@Example.COM "),
            recipientPhone: "+254 712 345 678"
          }))
        })
      )

      expect(order.customer).toEqual({ _tag: "Guest", email: "buyer@example.com", phone: "254712345678" })
      expect(order.recipient.phone).toBe("254712345678")
    })

    it("should attach a signed-in customer", async () => {
      const order = await runWithHarness(() =>
        Effect.gen(function* () {
          const checkout = yield* CheckoutService
          return yield* checkout.checkout(checkoutInput({
            userId: Option.some(testUserId),
            guestEmail: Option.none()
          }))
        })
      )

      expect(order.customer).toEqual({ _tag: "Registered", userId: "user-42" })
    })

    it("should snapshot discounted prices", async () => {
      const order = await runWithHarness(() =>
        Effect.gen(function* () {
          const checkout = yield* CheckoutService
          return yield* checkout.checkout(checkoutInput({ items: [{ productId: wiperBladeId, quantity: 2 }] }))
        })
      )

      expect(order.items[0]?.unitPriceCents).toBe(1699)
      expect(order.items[0]?.lineTotalCents).toBe(3398)
      expect(order.totalCents).toBe(33398)
    })

    it("should keep the stored prices when the catalog price changes later", async () => {
      const { placed, stored } = await runWithHarness(({ store }) =>
        Effect.gen(function* () {
          const checkout = yield* CheckoutService
          const placed = yield* checkout.checkout(checkoutInput())
          yield* store.reprice(brakePadsId, 120000)
          return { placed, stored: yield* checkout.findOrder(placed.orderNumber) }
        })
      )

      expect(stored.items.map((item) => [item.unitPriceCents, item.lineTotalCents])).toEqual([
        [95000, 190000],
        [350000, 350000]
      ])
      expect(stored.subtotalCents).toBe(540000)
      expect(stored.totalCents).toBe(570000)
      expect(stored.items).toEqual(placed.items)
    })

    it("should merge repeated lines for the same product", async () => {
      const order = await runWithHarness(() =>
        Effect.gen(function* () {
          const checkout = yield* CheckoutService
          return yield* checkout.checkout(checkoutInput({
            items: [
              { productId: brakePadsId, quantity: 2 },
              { productId: brakePadsId, quantity: 3 }
            ]
          }))
        })
      )

      expect(order.items).toHaveLength(1)
      expect(order.items[0]?.quantity).toBe(5)
      expect(order.items[0]?.lineTotalCents).toBe(475000)
    })
  })

  describe("validation", () => {
    it("should reject an empty cart", async () => {
      const issues = await validationIssues(checkoutInput({ items: [] }))
      expect(issues).toEqual([issue("items", "Cart is empty")])
    })

    it("should report unknown and retired products per line", async () => {
      const issues = await validationIssues(checkoutInput({
        items: [
          { productId: unknownProductId, quantity: 1 },
          { productId: retiredPartId, quantity: 1 },
          { productId: "not-a-uuid", quantity: 1 }
        ]
      }))

      expect(issues).toEqual([
        issue("items[0].product_id", "Product not found"),
        issue("items[1].product_id", "Carburettor Kit is no longer available"),
        issue("items[2].product_id", "Product not found")
      ])
    })

    it("should reject quantities outside 1..100", async () => {
      const issues = await validationIssues(checkoutInput({
        items: [
          { productId: brakePadsId, quantity: 0 },
          { productId: alternatorId, quantity: 101 }
        ]
      }))

      expect(issues).toEqual([
        issue("items[0].quantity", "Quantity must be between 1 and 100"),
        issue("items[1].quantity", "Quantity must be between 1 and 100")
      ])
    })

    it("should bound the merged quantity of a product", async () => {
      const issues = await validationIssues(checkoutInput({
        items: [
          { productId: brakePadsId, quantity: 60 },
          { productId: brakePadsId, quantity: 50 }
        ]
      }))

      expect(issues).toEqual([issue("items[0].quantity", "Total quantity of Front Brake Pads cannot exceed 100")])
    })

    it("should reject a phone number that is not a Kenyan mobile", async () => {
      const issues = await validationIssues(checkoutInput({ recipientPhone: "0812345678" }))
      expect(issues).toEqual([issue("recipient_phone", "Enter a valid Kenyan mobile number, e.g. 0712345678")])
    })

    it("should require an email for guests and validate it", async () => {
      const missing = await validationIssues(checkoutInput({ guestEmail: Option.none() }))
      const blank = await validationIssues(checkoutInput({ guestEmail: Option.some("   ") }))
      const invalid = await validationIssues(checkoutInput({ guestEmail: Option.some("buyer@example") }))

      expect(missing).toEqual([issue("guest_email", "Email is required for guest checkout")])
      expect(blank).toEqual([issue("guest_email", "Email is required for guest checkout")])
      expect(invalid).toEqual([issue("guest_email", "Invalid email format")])
    })

    it("should not let a signed-in customer also check out as a guest", async () => {
      const issues = await validationIssues(checkoutInput({ userId: Option.some(testUserId) }))
      expect(issues).toEqual([issue("guest_email", "Signed-in customers cannot check out as a guest")])
    })

    it("should stop at the first failing stage", async () => {
      // Bad quantity and bad phone: only the quantity is reported
      const issues = await validationIssues(checkoutInput({
        items: [{ productId: brakePadsId, quantity: 0 }],
        recipientPhone: "123"
      }))

      expect(issues).toEqual([issue("items[0].quantity", "Quantity must be between 1 and 100")])
    })
  })

  describe("stock", () => {
    it("should fail with InsufficientStockError and reserve nothing", async () => {
      const { result, brake, orders } = await runWithHarness(({ store }) =>
        Effect.gen(function* () {
          const checkout = yield* CheckoutService
          const result = yield* Effect.either(checkout.checkout(checkoutInput({
            items: [
              { productId: brakePadsId, quantity: 2 },
              { productId: alternatorId, quantity: 6 }
            ]
          })))
          return { result, brake: yield* store.product(brakePadsId), orders: yield* store.orders }
        })
      )

      expect(Either.isLeft(result) && result.left._tag).toBe("InsufficientStockError")
      if (Either.isLeft(result) && result.left._tag === "InsufficientStockError") {
        expect(result.left.productSku).toBe("ALT-12V-090")
        expect(result.left.requested).toBe(6)
        expect(result.left.available).toBe(5)
      }
      expect(brake.reservedStock).toBe(0)
      expect(orders).toHaveLength(0)
    })

    it("should release the reservations when the order cannot be saved", async () => {
      const { result, brake, alt, orders } = await runWithHarness(({ store }) =>
        Effect.gen(function* () {
          const checkout = yield* CheckoutService
          yield* store.failOrderInserts(new SqlError.SqlError({
            cause: new Error("Connection failed"),
            message: "Database connection error"
          }))
          const result = yield* Effect.either(checkout.checkout(checkoutInput()))
          return {
            result,
            brake: yield* store.product(brakePadsId),
            alt: yield* store.product(alternatorId),
            orders: yield* store.orders
          }
        })
      )

      expect(Either.isLeft(result) && result.left._tag).toBe("SqlError")
      expect([brake.stock, brake.reservedStock]).toEqual([10, 0])
      expect(alt.reservedStock).toBe(0)
      expect(orders).toHaveLength(0)
    })

    it("should never oversell across concurrent checkouts", async () => {
      const { results, alt, orders } = await runWithHarness(({ store }) =>
        Effect.gen(function* () {
          const checkout = yield* CheckoutService
          const results = yield* Effect.forEach(
            [1, 2, 3, 4],
            () => Effect.either(checkout.checkout(checkoutInput({ items: [{ productId: alternatorId, quantity: 2 }] }))),
            { concurrency: "unbounded" }
          )
          return { results, alt: yield* store.product(alternatorId), orders: yield* store.orders }
        })
      )

      expect(results.filter(Either.isRight)).toHaveLength(2)
      expect(alt.reservedStock).toBe(4)
      expect(orders).toHaveLength(2)
    })
  })

  describe("findOrder", () => {
    it("should look an order up by its number", async () => {
      const { created, found } = await runWithHarness(() =>
        Effect.gen(function* () {
          const checkout = yield* CheckoutService
          const created = yield* checkout.checkout(checkoutInput())
          return { created, found: yield* checkout.findOrder(created.orderNumber) }
        })
      )

      expect(found.id).toBe(created.id)
    })

    it("should treat a malformed number as not found", async () => {
      const result = await runWithHarness(() =>
        Effect.gen(function* () {
          const checkout = yield* CheckoutService
          return yield* Effect.either(checkout.findOrder("nope"))
        })
      )

      expect(Either.isLeft(result) && result.left._tag).toBe("OrderNotFoundError")
    })
  })
})
