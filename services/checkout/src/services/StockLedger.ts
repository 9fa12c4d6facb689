import { Context, Effect } from "effect"
import { SqlError } from "@effect/sql"
import type { ProductId, StockLevel, StockLine } from "../domain/Product.js"
import type {
  ConsistencyViolation,
  InsufficientStockError,
  ProductNotFoundError
} from "../domain/errors.js"

export class StockLedger extends Context.Tag("StockLedger")<
  StockLedger,
  {
    readonly reserve: (
      productId: ProductId,
      quantity: number
    ) => Effect.Effect<StockLevel, InsufficientStockError | ProductNotFoundError | SqlError.SqlError>

    readonly release: (
      productId: ProductId,
      quantity: number
    ) => Effect.Effect<StockLevel, ConsistencyViolation | SqlError.SqlError>

    readonly commit: (
      productId: ProductId,
      quantity: number
    ) => Effect.Effect<StockLevel, ConsistencyViolation | SqlError.SqlError>

    /**
     * Reserves every line in product-id order. If a line fails, lines
     * already reserved are released before the failure propagates.
     */
    readonly reserveAll: (
      lines: ReadonlyArray<StockLine>
    ) => Effect.Effect<
      ReadonlyArray<StockLevel>,
      InsufficientStockError | ProductNotFoundError | ConsistencyViolation | SqlError.SqlError
    >

    readonly releaseAll: (
      lines: ReadonlyArray<StockLine>
    ) => Effect.Effect<void, ConsistencyViolation | SqlError.SqlError>

    readonly commitAll: (
      lines: ReadonlyArray<StockLine>
    ) => Effect.Effect<void, ConsistencyViolation | SqlError.SqlError>
  }
>() {}
