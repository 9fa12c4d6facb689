import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import type { HttpServerError } from "@effect/platform"
import type { SqlError } from "@effect/sql"
import { Effect, Option, Schema, type ParseResult } from "effect"
import { CheckoutConfig } from "../config.js"
import { CheckoutRequest, OrderHistoryQuery, OrderNumberParams, UserId } from "../domain/Order.js"
import {
  ValidationError,
  type ConsistencyViolation,
  type InsufficientStockError,
  type OrderNotFoundError,
  type ProductNotFoundError
} from "../domain/errors.js"
import { CheckoutService } from "../services/CheckoutService.js"
import { orderResponse, orderSummaryResponse, validationBody } from "./presenters.js"

const USER_ID_HEADER = "x-user-id"

// Authentication happens upstream; a signed-in customer arrives with their id in a header
const readUserId = Effect.gen(function* () {
  const request = yield* HttpServerRequest.HttpServerRequest
  const header = Option.fromNullable(request.headers[USER_ID_HEADER])
  if (Option.isNone(header)) {
    return Option.none<UserId>()
  }
  return yield* Schema.decodeUnknown(UserId)(header.value).pipe(
    Effect.map(Option.some),
    Effect.mapError(() =>
      new ValidationError({ issues: [{ field: USER_ID_HEADER, message: "Invalid user id" }] })
    )
  )
})

const internalError = () =>
  HttpServerResponse.json(
    { error: "internal_error", message: "An unexpected error occurred" },
    { status: 500 }
  )

// POST /checkout
export const createCheckout = Effect.gen(function* () {
  const body = yield* HttpServerRequest.schemaBodyJson(CheckoutRequest)
  const userId = yield* readUserId

  const service = yield* CheckoutService
  const config = yield* CheckoutConfig

  const order = yield* service.checkout({
    items: body.items.map((line) => ({ productId: line.product_id, quantity: line.quantity })),
    deliveryAddress: body.delivery_address,
    deliveryCity: body.delivery_city,
    deliveryPostalCode: body.delivery_postal_code ?? null,
    recipientName: body.recipient_name,
    recipientPhone: body.recipient_phone,
    notes: body.customer_notes ?? null,
    userId,
    guestEmail: Option.fromNullable(body.guest_email)
  })

  return HttpServerResponse.json(
    {
      ...orderResponse(order),
      payment: {
        initiate_url: `${config.publicBaseUrl}/payments/initiate`,
        order_id: order.id
      }
    },
    { status: 201 }
  )
}).pipe(
  Effect.withSpan("POST /checkout"),
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
    ProductNotFoundError: (error: ProductNotFoundError) =>
      HttpServerResponse.json(
        {
          error: "product_not_found",
          product_id: error.productId,
          message: `Product ${error.productId} is no longer available`
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
    ConsistencyViolation: (error: ConsistencyViolation) =>
      Effect.gen(function* () {
        yield* Effect.logError("Checkout hit a consistency violation", {
          entity: error.entity,
          entityId: error.entityId,
          reason: error.reason
        })
        return internalError()
      }).pipe(Effect.flatten),
    SqlError: (_error: SqlError.SqlError) => internalError()
  })
)

// GET /orders/:order_number
export const getOrderByNumber = Effect.gen(function* () {
  const { order_number: orderNumber } = yield* HttpRouter.schemaPathParams(OrderNumberParams)
  const service = yield* CheckoutService

  const order = yield* service.findOrder(orderNumber)

  return HttpServerResponse.json(orderResponse(order))
}).pipe(
  Effect.withSpan("GET /orders/:order_number"),
  Effect.flatten,
  Effect.catchTags({
    ParseError: () =>
      HttpServerResponse.json(
        { error: "validation_error", message: "Missing order number" },
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

// GET /my-orders?order_status=&payment_status=
export const listMyOrders = Effect.gen(function* () {
  const userId = yield* readUserId
  if (Option.isNone(userId)) {
    return HttpServerResponse.json(
      { error: "unauthorized", message: "Sign in to see your orders" },
      { status: 401 }
    )
  }
  const query = yield* HttpServerRequest.schemaSearchParams(OrderHistoryQuery)
  const service = yield* CheckoutService

  const orders = yield* service.listOrders(userId.value, {
    orderStatus: Option.fromNullable(query.order_status),
    paymentStatus: Option.fromNullable(query.payment_status)
  })

  return HttpServerResponse.json(orders.map(orderSummaryResponse))
}).pipe(
  Effect.withSpan("GET /my-orders"),
  Effect.flatten,
  Effect.catchTags({
    ParseError: (error: ParseResult.ParseError) =>
      HttpServerResponse.json(
        { error: "validation_error", message: "Invalid order or payment status filter", details: error.message },
        { status: 400 }
      ),
    ValidationError: (error: ValidationError) =>
      HttpServerResponse.json(validationBody(error.issues), { status: 400 }),
    SqlError: (_error: SqlError.SqlError) => internalError()
  })
)

export const CheckoutRoutes = HttpRouter.empty.pipe(
  HttpRouter.post("/checkout", createCheckout),
  HttpRouter.get("/orders/:order_number", getOrderByNumber),
  HttpRouter.get("/my-orders", listMyOrders)
)
