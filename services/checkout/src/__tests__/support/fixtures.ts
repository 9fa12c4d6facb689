import { DateTime, Effect, Layer, Logger, LogLevel, Option, Redacted, Ref, Schema } from "effect"
import { Product, ProductId } from "../../domain/Product.js"
import {
  DeliveryDestination,
  Order,
  OrderId,
  OrderItem,
  Recipient,
  formatOrderNumber
} from "../../domain/Order.js"
import { PhoneNumber } from "../../domain/Phone.js"
import { GatewayError } from "../../domain/errors.js"
import { toChargeableUnits } from "../../domain/Money.js"
import { CheckoutConfig, GatewayConfig, WorkerConfig } from "../../config.js"
import { PaymentGateway, type StkPushAccepted, type StkPushParams } from "../../services/PaymentGateway.js"
import { StockLedgerLive } from "../../services/StockLedgerLive.js"
import { OrderStoreLive } from "../../services/OrderStoreLive.js"
import { FlatDeliveryFeeLive } from "../../services/DeliveryFeeEstimator.js"
import { CheckoutServiceLive } from "../../services/CheckoutServiceLive.js"
import { PaymentServiceLive } from "../../services/PaymentServiceLive.js"
import { CallbackReconcilerLive } from "../../services/CallbackReconcilerLive.js"
import type { CheckoutInput } from "../../services/CheckoutService.js"
import { makeInMemoryStore } from "./InMemoryStore.js"

export const brakePadsId = Schema.decodeUnknownSync(ProductId)("11111111-1111-4111-8111-111111111111")
export const alternatorId = Schema.decodeUnknownSync(ProductId)("22222222-2222-4222-8222-222222222222")
export const wiperBladeId = Schema.decodeUnknownSync(ProductId)("33333333-3333-4333-8333-333333333333")
export const retiredPartId = Schema.decodeUnknownSync(ProductId)("44444444-4444-4444-8444-444444444444")
export const unknownProductId = "55555555-5555-4555-8555-555555555555"

export const brakePads = new Product({
  id: brakePadsId,
  sku: "BRK-PAD-001",
  name: "Front Brake Pads",
  priceCents: 95000,
  discountPercent: 0,
  isActive: true,
  stock: 10,
  reservedStock: 0
})

export const alternator = new Product({
  id: alternatorId,
  sku: "ALT-12V-090",
  name: "12V Alternator",
  priceCents: 350000,
  discountPercent: 0,
  isActive: true,
  stock: 5,
  reservedStock: 0
})

export const wiperBlade = new Product({
  id: wiperBladeId,
  sku: "WPR-22IN",
  name: "22in Wiper Blade",
  priceCents: 1999,
  discountPercent: 15,
  isActive: true,
  stock: 3,
  reservedStock: 1
})

export const retiredPart = new Product({
  id: retiredPartId,
  sku: "OLD-CARB-01",
  name: "Carburettor Kit",
  priceCents: 420000,
  discountPercent: 0,
  isActive: false,
  stock: 2,
  reservedStock: 0
})

export const catalog = [brakePads, alternator, wiperBlade, retiredPart]

export const testPhone = Schema.decodeUnknownSync(PhoneNumber)("254712345678")
export const testOrderId = Schema.decodeUnknownSync(OrderId)("66666666-6666-4666-8666-666666666666")
export const testCreatedAt = DateTime.unsafeMake(new Date("2024-01-15T10:30:00Z"))

type OrderFields = ConstructorParameters<typeof Order>[0]

// 2 x 950.00 + 1 x 3500.00 + 300.00 delivery
export const makeOrder = (overrides: Partial<OrderFields> = {}): Order =>
  new Order({
    id: testOrderId,
    orderNumber: formatOrderNumber(testCreatedAt, "A1B2"),
    customer: { _tag: "Guest", email: "buyer@example.com", phone: testPhone },
    destination: new DeliveryDestination({ address: "Plot 12, Enterprise Road", city: "Nairobi", postalCode: "00100" }),
    recipient: new Recipient({ name: "Test Customer", phone: testPhone }),
    notes: null,
    items: [
      new OrderItem({
        productId: brakePadsId,
        productName: brakePads.name,
        productSku: brakePads.sku,
        unitPriceCents: 95000,
        quantity: 2,
        lineTotalCents: 190000
      }),
      new OrderItem({
        productId: alternatorId,
        productName: alternator.name,
        productSku: alternator.sku,
        unitPriceCents: 350000,
        quantity: 1,
        lineTotalCents: 350000
      })
    ],
    subtotalCents: 540000,
    deliveryFeeCents: 30000,
    totalCents: 570000,
    orderStatus: "pending",
    paymentStatus: "unpaid",
    failedPaymentAttempts: 0,
    createdAt: testCreatedAt,
    updatedAt: testCreatedAt,
    paidAt: null,
    shippedAt: null,
    deliveredAt: null,
    ...overrides
  })

export const testCheckoutConfig = {
  port: 3000,
  publicBaseUrl: "https://shop.test",
  deliveryFeeCents: 30000,
  maxPaymentAttempts: 3
}

export const testGatewayConfig = {
  environment: "sandbox" as const,
  baseUrl: "https://gateway.test",
  shortcode: "174379",
  passkey: Redacted.make("test-passkey"),
  consumerKey: "test-consumer-key",
  consumerSecret: Redacted.make("test-secret"),
  callbackUrl: "https://shop.test/payments/callback",
  callbackToken: Redacted.make("test-callback-token"),
  requestTimeoutMs: 1000
}

export const testWorkerConfig = {
  pollIntervalMs: 1000,
  batchSize: 20,
  concurrency: 4,
  leaseMs: 60000,
  maxRetryAttempts: 3,
  retryBaseDelayMs: 500,
  retryBackoffMultiplier: 3,
  retryMaxDelayMs: 300000,
  sweepIntervalMs: 30000,
  paymentTimeoutSeconds: 300
}

export const ConfigTest = Layer.mergeAll(
  Layer.succeed(CheckoutConfig, testCheckoutConfig),
  Layer.succeed(GatewayConfig, testGatewayConfig),
  Layer.succeed(WorkerConfig, testWorkerConfig)
)

export const checkoutInput = (overrides: Partial<CheckoutInput> = {}): CheckoutInput => ({
  items: [
    { productId: brakePadsId, quantity: 2 },
    { productId: alternatorId, quantity: 1 }
  ],
  deliveryAddress: "Plot 12, Enterprise Road",
  deliveryCity: "Nairobi",
  deliveryPostalCode: "00100",
  recipientName: "Test Customer",
  recipientPhone: "0712345678",
  notes: null,
  userId: Option.none(),
  guestEmail: Option.some("buyer@example.com"),
  ...overrides
})

export type GatewayBehaviour = (
  params: StkPushParams,
  call: number
) => Effect.Effect<StkPushAccepted, GatewayError>

export const acceptPush: GatewayBehaviour = (params, call) =>
  Effect.succeed({
    merchantRequestId: `mr-${call}`,
    checkoutRequestId: `ws_CO_${call}`,
    responseDescription: "Success. Request accepted for processing",
    customerMessage: "Success. Request accepted for processing",
    chargedUnits: toChargeableUnits(params.amountCents),
    raw: { MerchantRequestID: `mr-${call}`, CheckoutRequestID: `ws_CO_${call}`, ResponseCode: "0" }
  })

export const rejectPush = (reason: string): GatewayBehaviour => () =>
  Effect.fail(new GatewayError({ operation: "stkPush", reason, responseCode: "1", statusCode: 200, isRetryable: false }))

// Records every push; call numbers start at 1
export const makeFakeGateway = (behaviour: GatewayBehaviour = acceptPush) =>
  Effect.gen(function* () {
    const calls = yield* Ref.make<ReadonlyArray<StkPushParams>>([])
    const layer = Layer.succeed(PaymentGateway, {
      initiateStkPush: (params: StkPushParams) =>
        Ref.updateAndGet(calls, (previous) => [...previous, params]).pipe(
          Effect.flatMap((all) => behaviour(params, all.length))
        )
    })
    return { layer, calls: Ref.get(calls) }
  })

/**
 * Checkout, payment and reconciliation services over the in-memory store.
 */
export const makeHarness = (options: {
  readonly products?: ReadonlyArray<Product>
  readonly gateway?: GatewayBehaviour
} = {}) =>
  Effect.gen(function* () {
    const store = yield* makeInMemoryStore({ products: options.products ?? catalog })
    const gateway = yield* makeFakeGateway(options.gateway)

    const ledgers = Layer.mergeAll(StockLedgerLive, OrderStoreLive).pipe(Layer.provide(store.layer))
    const services = Layer.mergeAll(CheckoutServiceLive, PaymentServiceLive, CallbackReconcilerLive).pipe(
      Layer.provide(FlatDeliveryFeeLive),
      Layer.provide(ledgers),
      Layer.provide(gateway.layer),
      Layer.provide(store.layer),
      Layer.provide(ConfigTest)
    )

    return {
      store,
      gateway,
      layer: Layer.mergeAll(services, ledgers, store.layer, ConfigTest)
    }
  })

export type Harness = Effect.Effect.Success<ReturnType<typeof makeHarness>>
export type HarnessServices = Layer.Layer.Success<Harness["layer"]>

export const Quiet = Logger.minimumLogLevel(LogLevel.None)

export const runWithHarness = <A, E>(
  test: (harness: Harness) => Effect.Effect<A, E, HarnessServices>,
  options: Parameters<typeof makeHarness>[0] = {}
): Promise<A> =>
  Effect.gen(function* () {
    const harness = yield* makeHarness(options)
    return yield* test(harness).pipe(Effect.provide(harness.layer))
  }).pipe(Effect.provide(Quiet), Effect.runPromise)

export const stkCallback = (params: {
  readonly merchantRequestId: string
  readonly checkoutRequestId: string
  readonly resultCode: number
  readonly resultDesc?: string
  readonly amount?: number
  readonly receipt?: string
}) => ({
  Body: {
    stkCallback: {
      MerchantRequestID: params.merchantRequestId,
      CheckoutRequestID: params.checkoutRequestId,
      ResultCode: params.resultCode,
      ResultDesc: params.resultDesc ?? (params.resultCode === 0
        ? "The service request is processed successfully."
        : "Request cancelled by user"),
      ...(params.resultCode === 0
        ? {
            CallbackMetadata: {
              Item: [
                ...(params.amount === undefined ? [] : [{ Name: "Amount", Value: params.amount }]),
                { Name: "MpesaReceiptNumber", Value: params.receipt ?? "TST0000001" },
                { Name: "TransactionDate", Value: 20240115103000 },
                { Name: "PhoneNumber", Value: 254712345678 }
              ]
            }
          }
        : {})
    }
  }
})
