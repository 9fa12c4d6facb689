import { Layer, Effect, Match, Option } from "effect"
import { StockLedger } from "./StockLedger.js"
import { StockRepository } from "../repositories/StockRepository.js"
import { availableStock, type ProductId, type StockLevel, type StockLine } from "../domain/Product.js"
import {
  ConsistencyViolation,
  InsufficientStockError,
  ProductNotFoundError
} from "../domain/errors.js"

// Consistent lock order across concurrent checkouts
const sortLines = (lines: ReadonlyArray<StockLine>) =>
  [...lines].sort((a, b) => a.productId.localeCompare(b.productId))

export const StockLedgerLive = Layer.effect(
  StockLedger,
  Effect.gen(function* () {
    const repo = yield* StockRepository

    const reserve = (productId: ProductId, quantity: number) =>
      Effect.gen(function* () {
        const result = yield* repo.reserve(productId, quantity)

        return yield* Match.value(result).pipe(
          Match.tag("Applied", ({ level }) => Effect.succeed(level)),
          Match.tag("Rejected", ({ current }) =>
            Option.match(current, {
              onNone: () => Effect.fail(new ProductNotFoundError({ productId })),
              onSome: (level) =>
                Effect.fail(
                  new InsufficientStockError({
                    productId,
                    productSku: level.sku,
                    requested: quantity,
                    available: availableStock(level)
                  })
                )
            })
          ),
          Match.exhaustive
        )
      }).pipe(Effect.withSpan("StockLedger.reserve", { attributes: { productId, quantity } }))

    // release and commit only fail when the reservation is not there: a logic fault
    const settle = (operation: "release" | "commit") => (productId: ProductId, quantity: number) =>
      Effect.gen(function* () {
        const result = yield* repo[operation](productId, quantity)

        return yield* Match.value(result).pipe(
          Match.tag("Applied", ({ level }) => Effect.succeed(level)),
          Match.tag("Rejected", ({ current }) =>
            Effect.gen(function* () {
              const reason = Option.match(current, {
                onNone: () => "product does not exist",
                onSome: (level) =>
                  `reserved ${level.reservedStock} of stock ${level.stock}, cannot ${operation} ${quantity}`
              })
              yield* Effect.logError("Stock ledger consistency violation", {
                productId,
                operation,
                quantity,
                reason
              })
              return yield* Effect.fail(
                new ConsistencyViolation({ entity: "stock", entityId: productId, attempted: operation, reason })
              )
            })
          ),
          Match.exhaustive
        )
      }).pipe(Effect.withSpan(`StockLedger.${operation}`, { attributes: { productId, quantity } }))

    const release = settle("release")
    const commit = settle("commit")

    return {
      reserve,
      release,
      commit,

      reserveAll: (lines: ReadonlyArray<StockLine>) =>
        Effect.gen(function* () {
          const reserved: StockLine[] = []
          const levels: StockLevel[] = []

          for (const line of sortLines(lines)) {
            const outcome = yield* Effect.either(reserve(line.productId, line.quantity))
            if (outcome._tag === "Left") {
              yield* Effect.logInfo("Reservation failed, releasing earlier lines", {
                productId: line.productId,
                error: outcome.left._tag,
                releasing: reserved.length
              })
              for (const done of reserved) {
                yield* release(done.productId, done.quantity)
              }
              return yield* Effect.fail(outcome.left)
            }
            reserved.push(line)
            levels.push(outcome.right)
          }

          return levels
        }),

      releaseAll: (lines: ReadonlyArray<StockLine>) =>
        Effect.forEach(sortLines(lines), (line) => release(line.productId, line.quantity), {
          discard: true
        }),

      commitAll: (lines: ReadonlyArray<StockLine>) =>
        Effect.forEach(sortLines(lines), (line) => commit(line.productId, line.quantity), {
          discard: true
        })
    }
  })
)
