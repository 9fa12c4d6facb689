import { Layer, Effect, Either, Option } from "effect"
import { PaymentService, type InitiatePaymentInput, type PaymentInitiation } from "./PaymentService.js"
import { PaymentGateway, type StkPushAccepted } from "./PaymentGateway.js"
import { OrderStore } from "./OrderStore.js"
import { StockLedger } from "./StockLedger.js"
import { TransactionLogRepository } from "../repositories/TransactionLogRepository.js"
import { UnitOfWork } from "../repositories/UnitOfWork.js"
import { normalizePhoneNumber, type PhoneNumber } from "../domain/Phone.js"
import { unitsToCents } from "../domain/Money.js"
import { PaymentNotAllowedError, ValidationError, type GatewayError } from "../domain/errors.js"
import type { Order, OrderId } from "../domain/Order.js"

type InitiationAttempt = Either.Either<
  { readonly order: Order; readonly accepted: StkPushAccepted },
  { readonly order: Order; readonly phone: PhoneNumber; readonly error: GatewayError }
>

const canInitiate = (order: Order) =>
  order.orderStatus === "pending" && (order.paymentStatus === "unpaid" || order.paymentStatus === "failed")

export const PaymentServiceLive = Layer.effect(
  PaymentService,
  Effect.gen(function* () {
    const gateway = yield* PaymentGateway
    const orderStore = yield* OrderStore
    const stockLedger = yield* StockLedger
    const transactionLog = yield* TransactionLogRepository
    const unitOfWork = yield* UnitOfWork

    // A failed attempt released the stock; take it again before re-prompting
    const renewReservation = (order: Order) =>
      Effect.gen(function* () {
        yield* stockLedger.reserveAll(
          order.items.map((item) => ({ productId: item.productId, quantity: item.quantity }))
        )
        return yield* orderStore.transition(order, { _tag: "ReservationRenewed" })
      })

    const recordInitiationFailure = (order: Order, phone: PhoneNumber, error: GatewayError) =>
      Effect.gen(function* () {
        // Order stays unpaid with its reservation; the customer may retry
        yield* transactionLog.append({
          orderId: order.id,
          eventType: "initiation-failed",
          merchantRequestId: null,
          checkoutRequestId: null,
          phoneNumber: phone,
          amountCents: order.totalCents,
          resultCode: null,
          resultDesc: error.reason,
          receiptNumber: null,
          rawPayload: {
            operation: error.operation,
            reason: error.reason,
            response_code: error.responseCode ?? null,
            status_code: error.statusCode ?? null
          }
        })
        yield* Effect.logWarning("Payment initiation failed", {
          orderId: order.id,
          operation: error.operation,
          reason: error.reason,
          isRetryable: error.isRetryable
        })
      })

    return {
      initiate: (input: InitiatePaymentInput) =>
        Effect.gen(function* () {
          // The order stays locked from the status check until the accepted
          // prompt is on the ledger, so a second caller sees pending/pending
          const attempt = yield* unitOfWork.transaction(
            Effect.gen(function* () {
              const found = yield* orderStore.getForUpdate(input.orderId)

              const phone = normalizePhoneNumber(
                Option.getOrElse(input.phoneNumber, () => found.recipient.phone)
              )
              if (Option.isNone(phone)) {
                return yield* Effect.fail(new ValidationError({
                  issues: [{
                    field: "phone_number",
                    message: "Enter a valid Kenyan mobile number, e.g. 0712345678"
                  }]
                }))
              }

              if (!canInitiate(found)) {
                return yield* Effect.fail(new PaymentNotAllowedError({
                  orderId: found.id,
                  orderStatus: found.orderStatus,
                  paymentStatus: found.paymentStatus
                }))
              }

              const order = found.paymentStatus === "failed" ? yield* renewReservation(found) : found

              const pushed = yield* Effect.either(
                gateway.initiateStkPush({
                  phoneNumber: phone.value,
                  amountCents: order.totalCents,
                  accountReference: order.orderNumber,
                  description: `Payment for order ${order.orderNumber}`
                })
              )
              if (Either.isLeft(pushed)) {
                // Committed as is: a renewed reservation stays with the unpaid order
                const rejected: InitiationAttempt = Either.left({ order, phone: phone.value, error: pushed.left })
                return rejected
              }

              const accepted = pushed.right
              const updated = yield* orderStore.transition(order, { _tag: "PaymentInitiated" })
              yield* transactionLog.append({
                orderId: order.id,
                eventType: "payment-initiated",
                merchantRequestId: accepted.merchantRequestId,
                checkoutRequestId: accepted.checkoutRequestId,
                phoneNumber: phone.value,
                amountCents: unitsToCents(accepted.chargedUnits),
                resultCode: 0,
                resultDesc: accepted.responseDescription,
                receiptNumber: null,
                rawPayload: accepted.raw
              })
              const initiated: InitiationAttempt = Either.right({ order: updated, accepted })
              return initiated
            })
          )

          if (Either.isLeft(attempt)) {
            const { error, order, phone } = attempt.left
            yield* recordInitiationFailure(order, phone, error)
            return yield* Effect.fail(error)
          }

          const { accepted, order } = attempt.right
          yield* Effect.logInfo("Payment initiated", {
            orderId: order.id,
            orderNumber: order.orderNumber,
            checkoutRequestId: accepted.checkoutRequestId
          })

          return {
            order,
            merchantRequestId: accepted.merchantRequestId,
            checkoutRequestId: accepted.checkoutRequestId,
            customerMessage: accepted.customerMessage,
            responseDescription: accepted.responseDescription
          } satisfies PaymentInitiation
        }).pipe(Effect.withSpan("PaymentService.initiate", { attributes: { orderId: input.orderId } })),

      getStatus: (orderId: OrderId) => orderStore.get(orderId)
    }
  })
)
