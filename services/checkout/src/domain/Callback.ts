import { Effect, Option, Schema } from "effect"
import { unitsToCents } from "./Money.js"
import { ReconciliationError } from "./errors.js"

export const CallbackId = Schema.UUID.pipe(Schema.brand("CallbackId"))
export type CallbackId = typeof CallbackId.Type

export const CallbackStatus = Schema.Literal("PENDING", "PROCESSING", "PROCESSED", "FAILED", "REVIEW")
export type CallbackStatus = typeof CallbackStatus.Type

// Wire format of the STK push result callback
const CallbackMetadataItem = Schema.Struct({
  Name: Schema.String,
  Value: Schema.optional(Schema.Union(Schema.String, Schema.Number))
})

const ResultCode = Schema.Union(Schema.Int, Schema.NumberFromString.pipe(Schema.int()))

export const StkCallbackEnvelope = Schema.Struct({
  Body: Schema.Struct({
    stkCallback: Schema.Struct({
      MerchantRequestID: Schema.String,
      CheckoutRequestID: Schema.String,
      ResultCode,
      ResultDesc: Schema.String,
      CallbackMetadata: Schema.optional(
        Schema.Struct({
          Item: Schema.Array(CallbackMetadataItem)
        })
      )
    })
  })
})
export type StkCallbackEnvelope = typeof StkCallbackEnvelope.Type

/**
 * Gateway-neutral view of a payment result.
 */
export class PaymentNotification extends Schema.Class<PaymentNotification>("PaymentNotification")({
  merchantRequestId: Schema.String,
  checkoutRequestId: Schema.String,
  resultCode: Schema.Int,
  resultDesc: Schema.String,
  receiptNumber: Schema.NullOr(Schema.String),
  amountCents: Schema.NullOr(Schema.Int),
  payerPhone: Schema.NullOr(Schema.String),
  transactionDate: Schema.NullOr(Schema.String)
}) {}

const metadataValue = (
  items: ReadonlyArray<typeof CallbackMetadataItem.Type>,
  name: string
): Option.Option<string | number> =>
  Option.fromNullable(items.find((item) => item.Name === name)?.Value)

const asString = (value: Option.Option<string | number>): string | null =>
  Option.getOrNull(Option.map(value, String))

export const toPaymentNotification = (envelope: StkCallbackEnvelope): PaymentNotification => {
  const callback = envelope.Body.stkCallback
  const items = callback.CallbackMetadata?.Item ?? []
  const amount = metadataValue(items, "Amount").pipe(
    Option.map(Number),
    Option.filter(Number.isFinite),
    Option.map(unitsToCents)
  )

  return new PaymentNotification({
    merchantRequestId: callback.MerchantRequestID,
    checkoutRequestId: callback.CheckoutRequestID,
    resultCode: callback.ResultCode,
    resultDesc: callback.ResultDesc,
    receiptNumber: asString(metadataValue(items, "MpesaReceiptNumber")),
    amountCents: Option.getOrNull(amount),
    payerPhone: asString(metadataValue(items, "PhoneNumber")),
    transactionDate: asString(metadataValue(items, "TransactionDate"))
  })
}

export const decodeCallbackEnvelope = Schema.decodeUnknown(StkCallbackEnvelope)

/**
 * A callback as stored in the inbox, waiting for (or past) reconciliation.
 */
export class InboxCallback extends Schema.Class<InboxCallback>("InboxCallback")({
  id: CallbackId,
  checkoutRequestId: Schema.NullOr(Schema.String),
  rawPayload: Schema.Unknown,
  status: CallbackStatus,
  attempts: Schema.Int.pipe(Schema.nonNegative()),
  lastError: Schema.NullOr(Schema.String),
  receivedAt: Schema.DateTimeUtc
}) {}

// Synthetic notification used by the payment-timeout sweep
export const timeoutNotification = (params: {
  readonly merchantRequestId: string
  readonly checkoutRequestId: string
  readonly timeoutSeconds: number
}): PaymentNotification =>
  new PaymentNotification({
    merchantRequestId: params.merchantRequestId,
    checkoutRequestId: params.checkoutRequestId,
    resultCode: 1037,
    resultDesc: `No callback received within ${params.timeoutSeconds}s`,
    receiptNumber: null,
    amountCents: null,
    payerPhone: null,
    transactionDate: null
  })

/**
 * Decodes a stored or received payload into a notification.
 */
export const parseNotification = (payload: unknown): Effect.Effect<PaymentNotification, ReconciliationError> =>
  decodeCallbackEnvelope(payload).pipe(
    Effect.map(toPaymentNotification),
    Effect.mapError((error) =>
      new ReconciliationError({
        checkoutRequestId: "unknown",
        reason: "malformed_envelope",
        detail: error.message
      })
    )
  )
