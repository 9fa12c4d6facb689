import { Layer, Effect, Option, DateTime, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import {
  TransactionLogRepository,
  type AppendResult,
  type OpenInitiation
} from "./TransactionLogRepository.js"
import { OrderId } from "../domain/Order.js"
import {
  PaymentTransaction,
  PaymentTransactionId,
  TransactionEventType,
  type NewPaymentTransaction
} from "../domain/PaymentTransaction.js"

interface PaymentTransactionRow {
  id: string
  order_id: string
  event_type: string
  merchant_request_id: string | null
  checkout_request_id: string | null
  phone_number: string | null
  amount_cents: number | null
  result_code: number | null
  result_desc: string | null
  receipt_number: string | null
  raw_payload: unknown
  created_at: Date
}

interface OpenInitiationRow {
  order_id: string
  merchant_request_id: string
  checkout_request_id: string
  created_at: Date
}

const mapRowToTransaction = (row: PaymentTransactionRow): PaymentTransaction =>
  new PaymentTransaction({
    id: Schema.decodeUnknownSync(PaymentTransactionId)(row.id),
    orderId: Schema.decodeUnknownSync(OrderId)(row.order_id),
    eventType: Schema.decodeUnknownSync(TransactionEventType)(row.event_type),
    merchantRequestId: row.merchant_request_id,
    checkoutRequestId: row.checkout_request_id,
    phoneNumber: row.phone_number,
    amountCents: row.amount_cents,
    resultCode: row.result_code,
    resultDesc: row.result_desc,
    receiptNumber: row.receipt_number,
    rawPayload: row.raw_payload,
    createdAt: DateTime.unsafeFromDate(row.created_at)
  })

const firstOption = <A>(rows: ReadonlyArray<A>): Option.Option<A> =>
  rows.length > 0 ? Option.some(rows[0]) : Option.none()

export const TransactionLogRepositoryLive = Layer.effect(
  TransactionLogRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    return {
      append: (entry: NewPaymentTransaction) =>
        Effect.gen(function* () {
          // Partial unique index: entries without a checkout id never conflict
          const rows = yield* sql<PaymentTransactionRow>`
            INSERT INTO payment_transactions (
              order_id, event_type, merchant_request_id, checkout_request_id,
              phone_number, amount_cents, result_code, result_desc,
              receipt_number, raw_payload
            )
            VALUES (
              ${entry.orderId}::uuid, ${entry.eventType}, ${entry.merchantRequestId},
              ${entry.checkoutRequestId}, ${entry.phoneNumber}, ${entry.amountCents},
              ${entry.resultCode}, ${entry.resultDesc}, ${entry.receiptNumber},
              ${JSON.stringify(entry.rawPayload ?? {})}::jsonb
            )
            ON CONFLICT (checkout_request_id, event_type)
              WHERE checkout_request_id IS NOT NULL
              DO NOTHING
            RETURNING *
          `
          if (rows.length === 0) {
            yield* Effect.logDebug("Transaction log entry already recorded", {
              checkoutRequestId: entry.checkoutRequestId,
              eventType: entry.eventType
            })
            return { _tag: "AlreadyRecorded" } satisfies AppendResult
          }
          return { _tag: "Appended", transaction: mapRowToTransaction(rows[0]) } satisfies AppendResult
        }),

      findTerminal: (checkoutRequestId: string) =>
        Effect.gen(function* () {
          const rows = yield* sql<PaymentTransactionRow>`
            SELECT * FROM payment_transactions
            WHERE checkout_request_id = ${checkoutRequestId}
              AND event_type IN ('provider-timeout', 'user-cancelled', 'payment-succeeded', 'payment-failed')
            ORDER BY created_at ASC
            LIMIT 1
          `
          return Option.map(firstOption(rows), mapRowToTransaction)
        }),

      findInitiation: (checkoutRequestId: string) =>
        Effect.gen(function* () {
          const rows = yield* sql<PaymentTransactionRow>`
            SELECT * FROM payment_transactions
            WHERE checkout_request_id = ${checkoutRequestId}
              AND event_type = 'payment-initiated'
          `
          return Option.map(firstOption(rows), mapRowToTransaction)
        }),

      findOpenInitiations: (initiatedBefore: DateTime.Utc, limit: number) =>
        Effect.gen(function* () {
          const rows = yield* sql<OpenInitiationRow>`
            SELECT i.order_id, i.merchant_request_id, i.checkout_request_id, i.created_at
            FROM payment_transactions i
            JOIN orders o ON o.id = i.order_id
            WHERE i.event_type = 'payment-initiated'
              AND i.created_at < ${DateTime.toDate(initiatedBefore)}
              AND o.order_status = 'pending'
              AND o.payment_status = 'pending'
              AND NOT EXISTS (
                SELECT 1 FROM payment_transactions t
                WHERE t.checkout_request_id = i.checkout_request_id
                  AND t.event_type IN ('provider-timeout', 'user-cancelled', 'payment-succeeded', 'payment-failed')
              )
            ORDER BY i.created_at ASC
            LIMIT ${limit}
          `
          return rows.map((row): OpenInitiation => ({
            orderId: Schema.decodeUnknownSync(OrderId)(row.order_id),
            merchantRequestId: row.merchant_request_id,
            checkoutRequestId: row.checkout_request_id,
            initiatedAt: DateTime.unsafeFromDate(row.created_at)
          }))
        })
    }
  })
)
