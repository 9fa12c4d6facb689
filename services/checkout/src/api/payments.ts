import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import type { HttpServerError } from "@effect/platform"
import type { SqlError } from "@effect/sql"
import { DateTime, Effect, Match, Option, type ParseResult } from "effect"
import { OrderIdParams } from "../domain/Order.js"
import type { Order } from "../domain/Order.js"
import { InitiatePaymentRequest } from "../domain/PaymentTransaction.js"
import { formatCents } from "../domain/Money.js"
import type {
  CallbackAuthenticationError,
  ConsistencyViolation,
  GatewayError,
  InsufficientStockError,
  OrderNotFoundError,
  PaymentNotAllowedError,
  ProductNotFoundError,
  ValidationError
} from "../domain/errors.js"
import { CallbackReconciler } from "../services/CallbackReconciler.js"
import { PaymentService } from "../services/PaymentService.js"
import { validationBody } from "./presenters.js"

const internalError = () =>
  HttpServerResponse.json(
    { error: "internal_error", message: "An unexpected error occurred" },
    { status: 500 }
  )

const paymentStatusResponse = (order: Order) => ({
  order_id: order.id,
  order_number: order.orderNumber,
  order_status: order.orderStatus,
  payment_status: order.paymentStatus,
  total_amount: formatCents(order.totalCents),
  paid_at: order.paidAt ? DateTime.formatIso(order.paidAt) : null
})

// POST /payments/initiate
export const initiatePayment = Effect.gen(function* () {
  const body = yield* HttpServerRequest.schemaBodyJson(InitiatePaymentRequest)
  const service = yield* PaymentService

  const result = yield* service.initiate({
    orderId: body.order_id,
    phoneNumber: Option.fromNullable(body.phone_number)
  })

  return HttpServerResponse.json({
    order_id: result.order.id,
    order_number: result.order.orderNumber,
    payment_status: result.order.paymentStatus,
    merchant_request_id: result.merchantRequestId,
    checkout_request_id: result.checkoutRequestId,
    message: result.customerMessage
  })
}).pipe(
  Effect.withSpan("POST /payments/initiate"),
  Effect.flatten,
  Effect.catchTags({
    ParseError: (error: ParseResult.ParseError) =>
      HttpServerResponse.json(
        { error: "validation_error", message: "Invalid request body", details: error.message },
        { status: 400 }
      ),
    RequestError: (_error: HttpServerError.RequestError) =>
      HttpServerResponse.json(
        { error: "request_error", message: "Failed to parse request body" },
        { status: 400 }
      ),
    ValidationError: (error: ValidationError) =>
      HttpServerResponse.json(validationBody(error.issues), { status: 400 }),
    OrderNotFoundError: (error: OrderNotFoundError) =>
      HttpServerResponse.json(
        { error: "not_found", message: `Order ${error.orderId} not found` },
        { status: 404 }
      ),
    PaymentNotAllowedError: (error: PaymentNotAllowedError) =>
      HttpServerResponse.json(
        {
          error: "payment_not_allowed",
          order_status: error.orderStatus,
          payment_status: error.paymentStatus,
          message: `Order is ${error.orderStatus}/${error.paymentStatus} and cannot take a payment`
        },
        { status: 409 }
      ),
    InsufficientStockError: (error: InsufficientStockError) =>
      HttpServerResponse.json(
        {
          error: "insufficient_stock",
          product_id: error.productId,
          product_sku: error.productSku,
          requested: error.requested,
          available: error.available,
          message: `Only ${error.available} of ${error.productSku} left in stock`
        },
        { status: 409 }
      ),
    ProductNotFoundError: (error: ProductNotFoundError) =>
      HttpServerResponse.json(
        {
          error: "product_not_found",
          product_id: error.productId,
          message: `Product ${error.productId} is no longer available`
        },
        { status: 409 }
      ),
    GatewayError: (error: GatewayError) =>
      Effect.gen(function* () {
        yield* Effect.logWarning("Payment initiation failed at the gateway", {
          operation: error.operation,
          reason: error.reason
        })
        return HttpServerResponse.json(
          {
            error: "gateway_error",
            message: error.reason,
            response_code: error.responseCode ?? null,
            is_retryable: error.isRetryable
          },
          { status: 502 }
        )
      }).pipe(Effect.flatten),
    ConsistencyViolation: (error: ConsistencyViolation) =>
      HttpServerResponse.json(
        { error: "state_conflict", message: error.reason },
        { status: 409 }
      ),
    SqlError: (_error: SqlError.SqlError) => internalError()
  })
)

const ACCEPTED = {
  ResultCode: 0,
  ResultDesc: "The service request has been accepted for processing"
} as const

// The callback URL registered with the gateway carries the shared token as ?token=
const callbackToken = (url: string): Option.Option<string> =>
  Option.fromNullable(new URL(url, "http://localhost").searchParams.get("token"))

// POST /payments/callback
export const paymentCallback = Effect.gen(function* () {
  const request = yield* HttpServerRequest.HttpServerRequest
  const reconciler = yield* CallbackReconciler

  const body = yield* request.text
  const intake = yield* reconciler.receive(callbackToken(request.url), body)

  yield* Match.value(intake).pipe(
    Match.tag("Recorded", ({ callbackId, checkoutRequestId }) =>
      Effect.logInfo("Callback recorded", { callbackId, checkoutRequestId })
    ),
    Match.tag("Rejected", ({ callbackId, error }) =>
      Effect.logWarning("Callback rejected", { callbackId, reason: error.reason, detail: error.detail })
    ),
    Match.exhaustive
  )

  // Acknowledged either way; a rejected callback is kept for audit, never bounced
  return HttpServerResponse.json(ACCEPTED)
}).pipe(
  Effect.withSpan("POST /payments/callback"),
  Effect.flatten,
  Effect.catchTags({
    RequestError: (_error: HttpServerError.RequestError) =>
      HttpServerResponse.json(
        { ResultCode: 1, ResultDesc: "Unable to read request body" },
        { status: 400 }
      ),
    CallbackAuthenticationError: (_error: CallbackAuthenticationError) =>
      HttpServerResponse.json(
        { ResultCode: 1, ResultDesc: "Invalid callback token" },
        { status: 403 }
      ),
    // Not recorded: a non-2xx makes the gateway deliver again
    SqlError: (_error: SqlError.SqlError) =>
      HttpServerResponse.json(
        { ResultCode: 1, ResultDesc: "Temporarily unable to accept callback" },
        { status: 500 }
      )
  })
)

// GET /payments/status/:order_id
export const getPaymentStatus = Effect.gen(function* () {
  const { order_id: orderId } = yield* HttpRouter.schemaPathParams(OrderIdParams)
  const service = yield* PaymentService

  const order = yield* service.getStatus(orderId)

  return HttpServerResponse.json(paymentStatusResponse(order))
}).pipe(
  Effect.withSpan("GET /payments/status/:order_id"),
  Effect.flatten,
  Effect.catchTags({
    ParseError: () =>
      HttpServerResponse.json(
        { error: "validation_error", message: "Invalid order_id format. Must be a valid UUID." },
        { status: 400 }
      ),
    OrderNotFoundError: (error: OrderNotFoundError) =>
      HttpServerResponse.json(
        { error: "not_found", message: `Order ${error.orderId} not found` },
        { status: 404 }
      ),
    SqlError: (_error: SqlError.SqlError) => internalError()
  })
)

export const PaymentRoutes = HttpRouter.empty.pipe(
  HttpRouter.post("/payments/initiate", initiatePayment),
  HttpRouter.post("/payments/callback", paymentCallback),
  HttpRouter.get("/payments/status/:order_id", getPaymentStatus)
)
