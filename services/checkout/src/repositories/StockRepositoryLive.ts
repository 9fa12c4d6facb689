import { Layer, Effect, Option, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { StockRepository, type StockMutationResult } from "./StockRepository.js"
import { ProductId, StockLevel } from "../domain/Product.js"

interface StockRow {
  id: string
  sku: string
  stock: number
  reserved_stock: number
}

const mapRowToStockLevel = (row: StockRow): StockLevel =>
  new StockLevel({
    productId: Schema.decodeUnknownSync(ProductId)(row.id),
    sku: row.sku,
    stock: row.stock,
    reservedStock: row.reserved_stock
  })

export const StockRepositoryLive = Layer.effect(
  StockRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    // Reports the current counters when a conditional update matched no row
    const toResult = (productId: ProductId, rows: ReadonlyArray<StockRow>) =>
      Effect.gen(function* () {
        if (rows.length > 0) {
          return { _tag: "Applied", level: mapRowToStockLevel(rows[0]) } satisfies StockMutationResult
        }
        const current = yield* sql<StockRow>`
          SELECT id, sku, stock, reserved_stock FROM products WHERE id = ${productId}::uuid
        `
        return {
          _tag: "Rejected",
          current: current.length > 0 ? Option.some(mapRowToStockLevel(current[0])) : Option.none()
        } satisfies StockMutationResult
      })

    return {
      reserve: (productId: ProductId, quantity: number) =>
        Effect.gen(function* () {
          const rows = yield* sql<StockRow>`
            UPDATE products
            SET reserved_stock = reserved_stock + ${quantity},
                updated_at = NOW()
            WHERE id = ${productId}::uuid
              AND stock - reserved_stock >= ${quantity}
            RETURNING id, sku, stock, reserved_stock
          `
          return yield* toResult(productId, rows)
        }),

      release: (productId: ProductId, quantity: number) =>
        Effect.gen(function* () {
          const rows = yield* sql<StockRow>`
            UPDATE products
            SET reserved_stock = reserved_stock - ${quantity},
                updated_at = NOW()
            WHERE id = ${productId}::uuid
              AND reserved_stock >= ${quantity}
            RETURNING id, sku, stock, reserved_stock
          `
          return yield* toResult(productId, rows)
        }),

      commit: (productId: ProductId, quantity: number) =>
        Effect.gen(function* () {
          const rows = yield* sql<StockRow>`
            UPDATE products
            SET stock = stock - ${quantity},
                reserved_stock = reserved_stock - ${quantity},
                updated_at = NOW()
            WHERE id = ${productId}::uuid
              AND reserved_stock >= ${quantity}
              AND stock >= ${quantity}
            RETURNING id, sku, stock, reserved_stock
          `
          return yield* toResult(productId, rows)
        })
    }
  })
)
