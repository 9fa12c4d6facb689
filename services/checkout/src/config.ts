import { Config, Context, Effect, Layer, Redacted } from "effect"

export class CheckoutConfig extends Context.Tag("CheckoutConfig")<
  CheckoutConfig,
  {
    readonly port: number
    // Public base URL used to build payment links in checkout responses
    readonly publicBaseUrl: string
    readonly deliveryFeeCents: number
    // Failed payment outcomes after which a pending order is cancelled
    readonly maxPaymentAttempts: number
  }
>() {}

export const CheckoutConfigLive = Layer.effect(
  CheckoutConfig,
  Effect.gen(function* () {
    return {
      port: yield* Config.number("PORT").pipe(Config.withDefault(3000)),
      publicBaseUrl: yield* Config.string("PUBLIC_BASE_URL").pipe(
        Config.withDefault("http://localhost:3000")
      ),
      deliveryFeeCents: yield* Config.integer("DELIVERY_FEE_CENTS").pipe(Config.withDefault(20000)),
      maxPaymentAttempts: yield* Config.integer("CHECKOUT_MAX_PAYMENT_ATTEMPTS").pipe(
        Config.withDefault(3)
      )
    }
  })
)

export type GatewayEnvironment = "sandbox" | "production"

export const GATEWAY_BASE_URLS: Record<GatewayEnvironment, string> = {
  sandbox: "https://sandbox.safaricom.co.ke",
  production: "https://api.safaricom.co.ke"
}

export class GatewayConfig extends Context.Tag("GatewayConfig")<
  GatewayConfig,
  {
    readonly environment: GatewayEnvironment
    readonly baseUrl: string
    readonly shortcode: string
    readonly passkey: Redacted.Redacted
    readonly consumerKey: string
    readonly consumerSecret: Redacted.Redacted
    // Where the gateway posts results; the token is appended as ?token=
    readonly callbackUrl: string
    readonly callbackToken: Redacted.Redacted
    readonly requestTimeoutMs: number
  }
>() {}

export const GatewayConfigLive = Layer.effect(
  GatewayConfig,
  Effect.gen(function* () {
    const environment = yield* Config.literal("sandbox", "production")("MPESA_ENVIRONMENT").pipe(
      Config.withDefault("sandbox" as const)
    )
    return {
      environment,
      baseUrl: yield* Config.string("MPESA_BASE_URL").pipe(
        Config.withDefault(GATEWAY_BASE_URLS[environment])
      ),
      shortcode: yield* Config.string("MPESA_SHORTCODE").pipe(Config.withDefault("174379")),
      passkey: yield* Config.redacted("MPESA_PASSKEY"),
      consumerKey: yield* Config.string("MPESA_CONSUMER_KEY"),
      consumerSecret: yield* Config.redacted("MPESA_CONSUMER_SECRET"),
      callbackUrl: yield* Config.string("MPESA_CALLBACK_URL"),
      callbackToken: yield* Config.redacted("MPESA_CALLBACK_TOKEN"),
      requestTimeoutMs: yield* Config.integer("MPESA_REQUEST_TIMEOUT_MS").pipe(
        Config.withDefault(15000)
      )
    }
  })
)

export class WorkerConfig extends Context.Tag("WorkerConfig")<
  WorkerConfig,
  {
    readonly pollIntervalMs: number
    readonly batchSize: number
    readonly concurrency: number
    readonly leaseMs: number
    readonly maxRetryAttempts: number
    readonly retryBaseDelayMs: number
    readonly retryBackoffMultiplier: number
    readonly retryMaxDelayMs: number
    readonly sweepIntervalMs: number
    // Pending payments without a callback after this long are timed out
    readonly paymentTimeoutSeconds: number
  }
>() {}

export const WorkerConfigLive = Layer.effect(
  WorkerConfig,
  Effect.gen(function* () {
    return {
      pollIntervalMs: yield* Config.integer("WORKER_POLL_INTERVAL_MS").pipe(Config.withDefault(5000)),
      batchSize: yield* Config.integer("WORKER_BATCH_SIZE").pipe(Config.withDefault(20)),
      concurrency: yield* Config.integer("WORKER_CONCURRENCY").pipe(Config.withDefault(4)),
      leaseMs: yield* Config.integer("WORKER_LEASE_MS").pipe(Config.withDefault(60000)),
      maxRetryAttempts: yield* Config.integer("WORKER_MAX_RETRY_ATTEMPTS").pipe(Config.withDefault(8)),
      retryBaseDelayMs: yield* Config.integer("WORKER_RETRY_BASE_DELAY_MS").pipe(Config.withDefault(500)),
      retryBackoffMultiplier: yield* Config.number("WORKER_RETRY_BACKOFF_MULTIPLIER").pipe(
        Config.withDefault(3)
      ),
      retryMaxDelayMs: yield* Config.integer("WORKER_RETRY_MAX_DELAY_MS").pipe(
        Config.withDefault(300000)
      ),
      sweepIntervalMs: yield* Config.integer("WORKER_SWEEP_INTERVAL_MS").pipe(Config.withDefault(30000)),
      paymentTimeoutSeconds: yield* Config.integer("WORKER_PAYMENT_TIMEOUT_SECONDS").pipe(
        Config.withDefault(300)
      )
    }
  })
)
