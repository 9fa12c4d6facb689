import { describe, it, expect } from "vitest"
import { ConfigProvider, Effect, Exit, Layer, Redacted } from "effect"
import {
  CheckoutConfig,
  CheckoutConfigLive,
  GatewayConfig,
  GatewayConfigLive,
  WorkerConfig,
  WorkerConfigLive
} from "../config.js"

const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  Layer.setConfigProvider(ConfigProvider.fromMap(new Map(entries)))

const gatewaySecrets = [
  ["MPESA_PASSKEY", "test-passkey"],
  ["MPESA_CONSUMER_KEY", "test-consumer-key"],
  ["MPESA_CONSUMER_SECRET", "test-secret"],
  ["MPESA_CALLBACK_URL", "https://shop.test/payments/callback"],
  ["MPESA_CALLBACK_TOKEN", "test-callback-token"]
] as const

describe("CheckoutConfig", () => {
  it("should fall back to defaults", async () => {
    const config = await CheckoutConfig.pipe(
      Effect.provide(CheckoutConfigLive.pipe(Layer.provide(withEnv([])))),
      Effect.runPromise
    )

    expect(config).toEqual({
      port: 3000,
      publicBaseUrl: "http://localhost:3000",
      deliveryFeeCents: 20000,
      maxPaymentAttempts: 3
    })
  })

  it("should read overrides from the environment", async () => {
    const config = await CheckoutConfig.pipe(
      Effect.provide(
        CheckoutConfigLive.pipe(
          Layer.provide(withEnv([["PORT", "8080"], ["DELIVERY_FEE_CENTS", "0"], ["CHECKOUT_MAX_PAYMENT_ATTEMPTS", "5"]]))
        )
      ),
      Effect.runPromise
    )

    expect(config.port).toBe(8080)
    expect(config.deliveryFeeCents).toBe(0)
    expect(config.maxPaymentAttempts).toBe(5)
  })

  it("should have the correct tag name", () => {
    expect(CheckoutConfig.key).toBe("CheckoutConfig")
  })
})

describe("GatewayConfig", () => {
  it("should use the sandbox host unless told otherwise", async () => {
    const config = await GatewayConfig.pipe(
      Effect.provide(GatewayConfigLive.pipe(Layer.provide(withEnv(gatewaySecrets)))),
      Effect.runPromise
    )

    expect(config.environment).toBe("sandbox")
    expect(config.baseUrl).toBe("https://sandbox.safaricom.co.ke")
    expect(config.shortcode).toBe("174379")
    expect(Redacted.value(config.callbackToken)).toBe("test-callback-token")
  })

  it("should switch hosts for production", async () => {
    const config = await GatewayConfig.pipe(
      Effect.provide(
        GatewayConfigLive.pipe(Layer.provide(withEnv([...gatewaySecrets, ["MPESA_ENVIRONMENT", "production"]])))
      ),
      Effect.runPromise
    )

    expect(config.baseUrl).toBe("https://api.safaricom.co.ke")
  })

  it("should keep credentials out of logs", async () => {
    const config = await GatewayConfig.pipe(
      Effect.provide(GatewayConfigLive.pipe(Layer.provide(withEnv(gatewaySecrets)))),
      Effect.runPromise
    )

    expect(String(config.consumerSecret)).not.toContain("test-secret")
  })

  it("should fail without the gateway credentials", async () => {
    const exit = await GatewayConfig.pipe(
      Effect.provide(GatewayConfigLive.pipe(Layer.provide(withEnv([])))),
      Effect.runPromiseExit
    )

    expect(Exit.isFailure(exit)).toBe(true)
  })
})

describe("WorkerConfig", () => {
  it("should fall back to defaults", async () => {
    const config = await WorkerConfig.pipe(
      Effect.provide(WorkerConfigLive.pipe(Layer.provide(withEnv([])))),
      Effect.runPromise
    )

    expect(config.maxRetryAttempts).toBe(8)
    expect(config.leaseMs).toBe(60000)
    expect(config.paymentTimeoutSeconds).toBe(300)
  })
})
