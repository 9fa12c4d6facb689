import { Context, Effect } from "effect"
import type { PhoneNumber } from "../domain/Phone.js"
import type { GatewayError } from "../domain/errors.js"

export interface StkPushParams {
  readonly phoneNumber: PhoneNumber
  readonly amountCents: number
  // Shown to the customer on the prompt and echoed in the statement
  readonly accountReference: string
  readonly description: string
}

export interface StkPushAccepted {
  readonly merchantRequestId: string
  readonly checkoutRequestId: string
  readonly responseDescription: string
  readonly customerMessage: string
  readonly chargedUnits: number
  readonly raw: unknown
}

export class PaymentGateway extends Context.Tag("PaymentGateway")<
  PaymentGateway,
  {
    /**
     * Sends a payment prompt to the customer's phone. Success only means
     * the gateway accepted the request; the outcome arrives by callback.
     */
    readonly initiateStkPush: (params: StkPushParams) => Effect.Effect<StkPushAccepted, GatewayError>
  }
>() {}
