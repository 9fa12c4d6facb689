import { Layer, Effect, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { CatalogRepository } from "./CatalogRepository.js"
import { Product, ProductId } from "../domain/Product.js"

interface ProductRow {
  id: string
  sku: string
  name: string
  price_cents: number
  discount_percent: number
  is_active: boolean
  stock: number
  reserved_stock: number
}

const mapRowToProduct = (row: ProductRow): Product =>
  new Product({
    id: Schema.decodeUnknownSync(ProductId)(row.id),
    sku: row.sku,
    name: row.name,
    priceCents: row.price_cents,
    discountPercent: row.discount_percent,
    isActive: row.is_active,
    stock: row.stock,
    reservedStock: row.reserved_stock
  })

export const CatalogRepositoryLive = Layer.effect(
  CatalogRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    return {
      findByIds: (ids: ReadonlyArray<ProductId>) =>
        Effect.gen(function* () {
          if (ids.length === 0) {
            return []
          }
          const rows = yield* sql<ProductRow>`
            SELECT id, sku, name, price_cents, discount_percent, is_active, stock, reserved_stock
            FROM products
            WHERE id = ANY(${[...ids]}::uuid[])
          `
          return rows.map(mapRowToProduct)
        })
    }
  })
)
