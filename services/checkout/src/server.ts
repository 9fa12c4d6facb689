import { HttpRouter, HttpServer, HttpServerResponse } from "@effect/platform"
import { NodeHttpServer, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import { createServer } from "node:http"
import { HealthRoutes } from "./api/health.js"
import { CheckoutRoutes } from "./api/checkout.js"
import { PaymentRoutes } from "./api/payments.js"
import { AppLive } from "./layers.js"
import { CheckoutConfig } from "./config.js"
import { makeTelemetryLive } from "./telemetry.js"

// Root route - service identification
const rootRoute = HttpRouter.empty.pipe(
  HttpRouter.get(
    "/",
    Effect.succeed(
      HttpServerResponse.text("Checkout Service - auto parts storefront")
    )
  )
)

// Compose all routes
const router = HttpRouter.empty.pipe(
  HttpRouter.mount("/", rootRoute),
  HttpRouter.mount("/", HealthRoutes),
  HttpRouter.mount("/", CheckoutRoutes),
  HttpRouter.mount("/", PaymentRoutes)
)

// Create HTTP server with dynamic port from config
const HttpLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* CheckoutConfig

    return router.pipe(
      HttpServer.serve(),
      HttpServer.withLogAddress,
      Layer.provide(
        NodeHttpServer.layer(createServer, { port: config.port })
      )
    )
  })
)

// Compose final application layer
const MainLive = HttpLive.pipe(
  Layer.provide(AppLive),
  Layer.provide(makeTelemetryLive("checkout-service"))
)

// Launch the server
Layer.launch(MainLive).pipe(NodeRuntime.runMain)
