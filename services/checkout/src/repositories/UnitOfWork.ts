import { Context, Effect } from "effect"
import { SqlError } from "@effect/sql"

/**
 * Scoped atomic unit. Everything run inside one `transaction` commits or
 * rolls back together; nested calls join the outer transaction.
 */
export class UnitOfWork extends Context.Tag("UnitOfWork")<
  UnitOfWork,
  {
    readonly transaction: <A, E, R>(
      effect: Effect.Effect<A, E, R>
    ) => Effect.Effect<A, E | SqlError.SqlError, R>
  }
>() {}
