import { drizzle } from "drizzle-orm/node-postgres"
import { Context, Data, Effect, pipe } from "effect"
import type { Scope } from "effect/Scope"
import { Pool } from "pg"

export class DrizzleError extends Data.TaggedError("DrizzleError")<{
  readonly message: string
}> {}

export type DrizzleDatabase = ReturnType<typeof drizzle>

export type DrizzleServiceShape = {
  readonly db: DrizzleDatabase
}

export class DrizzleService extends Context.Tag("DrizzleService")<
  DrizzleService,
  DrizzleServiceShape
>() {}

const toDrizzleError = (
  error: DrizzleError | Error | string
): DrizzleError =>
  error instanceof DrizzleError
    ? error
    : new DrizzleError({
      message: error instanceof Error ? error.message : error
    })

export type DatabaseSettings = {
  readonly url: string
  readonly poolSize: number
}

const idleTimeoutMillis = 30_000
const connectionTimeoutMillis = 10_000
const applicationName = "match-bot"

const toError = (error: unknown): DrizzleError => toDrizzleError(error instanceof Error ? error : String(error))

const makePool = (settings: DatabaseSettings) =>
  Effect.acquireRelease(
    Effect.try({
      try: () =>
        new Pool({
          connectionString: settings.url,
          max: settings.poolSize,
          idleTimeoutMillis,
          connectionTimeoutMillis,
          application_name: applicationName
        }),
      catch: toError
    }),
    (pool) =>
      pipe(
        Effect.tryPromise({ try: () => pool.end(), catch: toError }),
        Effect.matchEffect({
          onFailure: (error) => Effect.logWarning(`Database pool did not close cleanly: ${error.message}`),
          onSuccess: () => Effect.logInfo("Database pool closed")
        }),
        Effect.asVoid
      )
  )

// A bad url or an unreachable server fails here instead of on the first update.
const checkConnection = (pool: Pool, settings: DatabaseSettings): Effect.Effect<void, DrizzleError> =>
  pipe(
    Effect.tryPromise({ try: () => pool.query("select 1"), catch: toError }),
    Effect.zipRight(Effect.logInfo(`Database connected (pool size ${settings.poolSize})`))
  )

// CHANGE: expose a typed Drizzle database in a scoped Effect service
// WHY: profiles and likes live in PostgreSQL when a database url is configured
// FORMAT THEOREM: forall q: run(q) -> errors are typed as DrizzleError
// PURITY: SHELL
// EFFECT: Effect<DrizzleServiceShape, DrizzleError, Scope>
// INVARIANT: pool is closed when scope ends
// COMPLEXITY: O(1)/O(1)
export const makeDrizzleService = (
  settings: DatabaseSettings
): Effect.Effect<DrizzleServiceShape, DrizzleError, Scope> =>
  pipe(
    makePool(settings),
    Effect.tap((pool) => checkConnection(pool, settings)),
    Effect.map((pool) => ({
      db: drizzle({ client: pool })
    }))
  )
