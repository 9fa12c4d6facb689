import { Context, Effect } from "effect"
import { SqlError } from "@effect/sql"
import type { Product, ProductId } from "../domain/Product.js"

export class CatalogRepository extends Context.Tag("CatalogRepository")<
  CatalogRepository,
  {
    /**
     * Looks up products by id. Unknown ids are simply absent from the result.
     */
    readonly findByIds: (
      ids: ReadonlyArray<ProductId>
    ) => Effect.Effect<ReadonlyArray<Product>, SqlError.SqlError>
  }
>() {}
