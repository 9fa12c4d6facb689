import { Layer, Effect, DateTime, Duration, Option, Redacted, Ref, Schema } from "effect"
import { HttpClient, HttpClientRequest } from "@effect/platform"
import { PaymentGateway, type StkPushAccepted, type StkPushParams } from "./PaymentGateway.js"
import { GatewayConfig } from "../config.js"
import { GatewayError } from "../domain/errors.js"
import { toChargeableUnits } from "../domain/Money.js"
import { compactTimestamp, toEastAfricaTime } from "../domain/Timestamp.js"

const TokenResponse = Schema.Struct({
  access_token: Schema.String,
  expires_in: Schema.Union(Schema.Number, Schema.NumberFromString)
})

const StkPushResponse = Schema.Struct({
  MerchantRequestID: Schema.String,
  CheckoutRequestID: Schema.String,
  ResponseCode: Schema.String,
  ResponseDescription: Schema.String,
  CustomerMessage: Schema.optionalWith(Schema.String, { default: () => "" })
})

// Shape of a rejected request (4xx/5xx)
const GatewayErrorResponse = Schema.Struct({
  errorCode: Schema.optional(Schema.String),
  errorMessage: Schema.optional(Schema.String)
})

// Refresh tokens slightly before the gateway expires them
const TOKEN_EXPIRY_MARGIN = Duration.seconds(60)

interface CachedToken {
  readonly value: string
  readonly expiresAt: DateTime.Utc
}

export const stkPassword = (shortcode: string, passkey: string, timestamp: string): string =>
  Buffer.from(`${shortcode}${passkey}${timestamp}`).toString("base64")

export const PaymentGatewayLive = Layer.effect(
  PaymentGateway,
  Effect.gen(function* () {
    const config = yield* GatewayConfig
    const client = yield* HttpClient.HttpClient
    const tokenCache = yield* Ref.make(Option.none<CachedToken>())
    const timeout = Duration.millis(config.requestTimeoutMs)

    const callbackUrl = (() => {
      const url = new URL(config.callbackUrl)
      url.searchParams.set("token", Redacted.value(config.callbackToken))
      return url.toString()
    })()

    const connectionError = (operation: "authenticate" | "stkPush") => (error: unknown) =>
      Effect.fail(new GatewayError({
        operation,
        reason: error instanceof Error ? error.message : String(error),
        isRetryable: true
      }))

    const fetchToken = Effect.gen(function* () {
      const request = HttpClientRequest.get(`${config.baseUrl}/oauth/v1/generate`).pipe(
        HttpClientRequest.setUrlParam("grant_type", "client_credentials"),
        HttpClientRequest.basicAuth(config.consumerKey, Redacted.value(config.consumerSecret))
      )

      const response = yield* client.execute(request).pipe(
        Effect.timeout(timeout),
        Effect.catchTag("TimeoutException", connectionError("authenticate")),
        Effect.catchTag("RequestError", connectionError("authenticate")),
        Effect.catchTag("ResponseError", connectionError("authenticate"))
      )

      if (response.status !== 200) {
        return yield* Effect.fail(new GatewayError({
          operation: "authenticate",
          reason: `Token request rejected with status ${response.status}`,
          statusCode: response.status,
          isRetryable: response.status >= 500
        }))
      }

      const body = yield* response.json.pipe(
        Effect.flatMap(Schema.decodeUnknown(TokenResponse)),
        Effect.mapError(() => new GatewayError({
          operation: "authenticate",
          reason: "Invalid token response format",
          isRetryable: false
        }))
      )

      const now = yield* DateTime.now
      const token: CachedToken = {
        value: body.access_token,
        expiresAt: DateTime.addDuration(
          now,
          Duration.subtract(Duration.seconds(body.expires_in), TOKEN_EXPIRY_MARGIN)
        )
      }
      yield* Ref.set(tokenCache, Option.some(token))
      yield* Effect.logDebug("Obtained gateway access token", {
        expiresAt: DateTime.formatIso(token.expiresAt)
      })
      return token.value
    }).pipe(
      // The response body is only readable while the request's scope is open
      Effect.scoped
    )

    const accessToken = Effect.gen(function* () {
      const cached = yield* Ref.get(tokenCache)
      const now = yield* DateTime.now
      if (Option.isSome(cached) && DateTime.lessThan(now, cached.value.expiresAt)) {
        return cached.value.value
      }
      return yield* fetchToken
    })

    return {
      initiateStkPush: (params: StkPushParams) =>
        Effect.gen(function* () {
          const token = yield* accessToken
          const timestamp = compactTimestamp(toEastAfricaTime(yield* DateTime.now))
          const chargedUnits = toChargeableUnits(params.amountCents)

          yield* Effect.logDebug("Sending STK push", {
            accountReference: params.accountReference,
            amount: chargedUnits
          })

          const request = HttpClientRequest.post(`${config.baseUrl}/mpesa/stkpush/v1/processrequest`).pipe(
            HttpClientRequest.bearerToken(token),
            HttpClientRequest.bodyUnsafeJson({
              BusinessShortCode: config.shortcode,
              Password: stkPassword(config.shortcode, Redacted.value(config.passkey), timestamp),
              Timestamp: timestamp,
              TransactionType: "CustomerPayBillOnline",
              Amount: chargedUnits,
              PartyA: params.phoneNumber,
              PartyB: config.shortcode,
              PhoneNumber: params.phoneNumber,
              CallBackURL: callbackUrl,
              AccountReference: params.accountReference,
              TransactionDesc: params.description
            })
          )

          const response = yield* client.execute(request).pipe(
            Effect.timeout(timeout),
            Effect.catchTag("TimeoutException", connectionError("stkPush")),
            Effect.catchTag("RequestError", connectionError("stkPush")),
            Effect.catchTag("ResponseError", connectionError("stkPush"))
          )

          const rawBody = yield* response.json.pipe(
            Effect.catchAll(() => Effect.succeed<unknown>(null))
          )

          if (response.status === 401) {
            // Token revoked early; drop it so the next attempt re-authenticates
            yield* Ref.set(tokenCache, Option.none())
          }

          if (response.status !== 200) {
            const rejection = Schema.decodeUnknownOption(GatewayErrorResponse)(rawBody)
            return yield* Effect.fail(new GatewayError({
              operation: "stkPush",
              reason: rejection.pipe(
                Option.flatMap((body) => Option.fromNullable(body.errorMessage)),
                Option.getOrElse(() => `STK push rejected with status ${response.status}`)
              ),
              responseCode: rejection.pipe(
                Option.flatMap((body) => Option.fromNullable(body.errorCode)),
                Option.getOrUndefined
              ),
              statusCode: response.status,
              isRetryable: response.status >= 500 || response.status === 401
            }))
          }

          const body = yield* Schema.decodeUnknown(StkPushResponse)(rawBody).pipe(
            Effect.mapError(() => new GatewayError({
              operation: "stkPush",
              reason: "Invalid STK push response format",
              statusCode: response.status,
              isRetryable: false
            }))
          )

          if (body.ResponseCode !== "0") {
            return yield* Effect.fail(new GatewayError({
              operation: "stkPush",
              reason: body.ResponseDescription,
              responseCode: body.ResponseCode,
              statusCode: response.status,
              isRetryable: false
            }))
          }

          yield* Effect.logInfo("STK push accepted", {
            accountReference: params.accountReference,
            checkoutRequestId: body.CheckoutRequestID
          })

          return {
            merchantRequestId: body.MerchantRequestID,
            checkoutRequestId: body.CheckoutRequestID,
            responseDescription: body.ResponseDescription,
            customerMessage: body.CustomerMessage,
            chargedUnits,
            raw: rawBody
          } satisfies StkPushAccepted
        }).pipe(
          Effect.scoped,
          Effect.withSpan("PaymentGateway.initiateStkPush")
        )
    }
  })
)
