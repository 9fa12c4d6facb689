import { Context, Effect, Layer } from "effect"
import { CheckoutConfig } from "../config.js"
import type { DeliveryDestination } from "../domain/Order.js"

/**
 * Delivery fee collaborator. The fee formula lives outside checkout;
 * checkout only adds the estimate to the order total.
 */
export class DeliveryFeeEstimator extends Context.Tag("DeliveryFeeEstimator")<
  DeliveryFeeEstimator,
  {
    readonly estimate: (destination: DeliveryDestination) => Effect.Effect<number>
  }
>() {}

// Flat configured fee, whatever the destination
export const FlatDeliveryFeeLive = Layer.effect(
  DeliveryFeeEstimator,
  Effect.gen(function* () {
    const config = yield* CheckoutConfig
    return {
      estimate: (_destination: DeliveryDestination) => Effect.succeed(config.deliveryFeeCents)
    }
  })
)
