import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type { ProductId, StockLevel } from "../domain/Product.js"

// Result of a conditional counter update - discriminated union
export type StockMutationResult =
  | { readonly _tag: "Applied"; readonly level: StockLevel }
  | { readonly _tag: "Rejected"; readonly current: Option.Option<StockLevel> }

export class StockRepository extends Context.Tag("StockRepository")<
  StockRepository,
  {
    /**
     * reserved_stock += quantity, only while stock - reserved_stock >= quantity.
     * Single conditional UPDATE: no read-then-write gap.
     */
    readonly reserve: (
      productId: ProductId,
      quantity: number
    ) => Effect.Effect<StockMutationResult, SqlError.SqlError>

    /**
     * reserved_stock -= quantity, only while reserved_stock >= quantity.
     */
    readonly release: (
      productId: ProductId,
      quantity: number
    ) => Effect.Effect<StockMutationResult, SqlError.SqlError>

    /**
     * stock -= quantity and reserved_stock -= quantity, only while both
     * cover the quantity. Turns a reservation into a permanent deduction.
     */
    readonly commit: (
      productId: ProductId,
      quantity: number
    ) => Effect.Effect<StockMutationResult, SqlError.SqlError>
  }
>() {}
