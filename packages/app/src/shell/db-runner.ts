import { Effect, Either, Option, pipe } from "effect"

import type { DrizzleDatabase } from "./drizzle.js"

export type DbRunner<E> = <A>(
  run: () => PromiseLike<A>
) => Effect.Effect<A, E>

// CHANGE: lift Promise-returning DB calls into typed Effects
// WHY: keep database IO explicit and typed at the shell boundary
// FORMAT THEOREM: ∀run: Effect(run) either succeeds or returns typed E
// PURITY: SHELL
// EFFECT: Effect<A, E>
// INVARIANT: thrown errors are mapped to the provided error type
// COMPLEXITY: O(1)/O(1)
export const makeDbRunner = <E>(
  onError: (error: Error | string) => E
): DbRunner<E> =>
<A>(run: () => PromiseLike<A>) =>
  Effect.tryPromise({
    try: run,
    catch: (error) => onError(error instanceof Error ? error : String(error))
  })

type TransactionCallback = Parameters<DrizzleDatabase["transaction"]>[0]
export type DrizzleTransaction = Parameters<TransactionCallback>[0]

// The part of a drizzle database the runner needs.
export type TransactionHost<Tx> = {
  readonly transaction: <R>(run: (tx: Tx) => Promise<R>) => Promise<R>
}

// CHANGE: execute an Effect inside a Drizzle transaction
// WHY: multi-statement store operations must be all-or-nothing
// FORMAT THEOREM: ∀tx: run(tx) ⇒ atomic(tx)
// PURITY: SHELL
// EFFECT: Effect<A, E>
// INVARIANT: a failed effect rolls the transaction back and keeps its own typed error
// COMPLEXITY: O(1)/O(1)
export const runInTransaction = <Tx, E, A>(
  db: TransactionHost<Tx>,
  onError: (error: Error | string) => E,
  effect: (tx: Tx) => Effect.Effect<A, E>
): Effect.Effect<A, E> =>
  Effect.suspend(() => {
    let failure: Option.Option<E> = Option.none()
    return Effect.tryPromise({
      try: () =>
        db.transaction((tx) =>
          Effect.runPromise(Effect.either(effect(tx))).then((result) => {
            if (Either.isLeft(result)) {
              failure = Option.some(result.left)
              throw new Error("transaction rolled back")
            }
            return result.right
          })
        ),
      catch: (error) =>
        pipe(
          failure,
          Option.getOrElse(() => onError(error instanceof Error ? error : String(error)))
        )
    })
  })
