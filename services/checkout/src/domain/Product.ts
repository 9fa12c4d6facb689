import { Schema } from "effect"

export const ProductId = Schema.UUID.pipe(Schema.brand("ProductId"))
export type ProductId = typeof ProductId.Type

// Catalog view of a product. The catalog owns these rows; checkout only reads
// them and moves the stock counters through the Stock Ledger.
export class Product extends Schema.Class<Product>("Product")({
  id: ProductId,
  sku: Schema.String,
  name: Schema.String,
  priceCents: Schema.Int.pipe(Schema.nonNegative()),
  discountPercent: Schema.Int.pipe(Schema.between(0, 100)),
  isActive: Schema.Boolean,
  stock: Schema.Int.pipe(Schema.nonNegative()),
  reservedStock: Schema.Int.pipe(Schema.nonNegative())
}) {}

export class StockLevel extends Schema.Class<StockLevel>("StockLevel")({
  productId: ProductId,
  sku: Schema.String,
  stock: Schema.Int.pipe(Schema.nonNegative()),
  reservedStock: Schema.Int.pipe(Schema.nonNegative())
}) {}

export const availableStock = (level: { readonly stock: number; readonly reservedStock: number }): number =>
  Math.max(0, level.stock - level.reservedStock)

/**
 * Unit price after the catalog discount, rounded half up to the cent.
 */
export const discountedPriceCents = (product: Pick<Product, "priceCents" | "discountPercent">): number =>
  Math.floor((product.priceCents * (100 - product.discountPercent) + 50) / 100)

// A quantity of one product, used for reservations and their release/commit
export interface StockLine {
  readonly productId: ProductId
  readonly quantity: number
}
