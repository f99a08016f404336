import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import { Effect, pipe, Ref, type Scope } from "effect"

import { nextOffset, toUserEvents } from "../core/updates.js"
import { type Config, loadConfig } from "../shell/config.js"
import { DrizzleService, makeDrizzleService } from "../shell/drizzle.js"
import { ProfileStore, ProfileStoreError, type ProfileStoreShape } from "../shell/profile-store.js"
import { makeDbProfileStore } from "../shell/profile-store-db.js"
import { makeMemoryProfileStore } from "../shell/profile-store-memory.js"
import { makeTelegramService, TelegramService, type TelegramServiceShape } from "../shell/telegram.js"
import { dispatchBatch } from "./dispatch.js"
import { formatError, logAndFallback, logUpdates } from "./diagnostics.js"
import { makeSessionRegistry, type SessionRegistry } from "./sessions.js"

const longPollSeconds = 25
const retryDelay = "3 seconds"

type LoopContext = {
  readonly config: Config
  readonly registry: SessionRegistry
  readonly offset: Ref.Ref<number>
  readonly botUsername: string | undefined
}

// CHANGE: pick the profile store for this run
// WHY: PostgreSQL when a database url is configured, memory otherwise
// FORMAT THEOREM: ∀c: store(c) = db ⇔ c.databaseUrl != null
// PURITY: SHELL
// EFFECT: Effect<ProfileStoreShape, ProfileStoreError, Scope | FileSystem | Path>
// INVARIANT: the database pool lives as long as the enclosing scope
// COMPLEXITY: O(1)/O(1)
const makeProfileStore = (
  config: Config
): Effect.Effect<ProfileStoreShape, ProfileStoreError, Scope.Scope | FileSystem.FileSystem | Path.Path> =>
  config.databaseUrl === null
    ? pipe(
      Effect.logWarning("BOT_DATABASE_URL is not set: profiles and likes are kept in memory only"),
      Effect.zipRight(makeMemoryProfileStore())
    )
    : pipe(
      makeDrizzleService({ url: config.databaseUrl, poolSize: config.databasePoolSize }),
      Effect.mapError((error) => new ProfileStoreError({ message: error.message })),
      Effect.flatMap((drizzleService) =>
        pipe(
          makeDbProfileStore(),
          Effect.provideService(DrizzleService, drizzleService)
        )
      )
    )

const runOnce = (
  context: LoopContext
): Effect.Effect<void, never, ProfileStore | TelegramService> =>
  pipe(
    Effect.gen(function*(_) {
      const telegram = yield* _(TelegramService)
      const store = yield* _(ProfileStore)
      const offset = yield* _(Ref.get(context.offset))
      const updates = yield* _(telegram.getUpdates(offset, longPollSeconds))
      yield* _(logUpdates(updates))
      yield* _(Ref.set(context.offset, nextOffset(offset, updates)))
      yield* _(
        dispatchBatch(
          {
            telegram,
            store,
            registry: context.registry,
            adminIds: context.config.adminIds,
            supportLink: context.config.supportLink
          },
          toUserEvents(updates, context.botUsername)
        )
      )
    }),
    Effect.catchAll((error) =>
      pipe(
        Effect.logError(formatError(error)),
        Effect.zipRight(Effect.sleep(retryDelay))
      )
    )
  )

const loop = (
  context: LoopContext
): Effect.Effect<void, never, ProfileStore | TelegramService> => pipe(runOnce(context), Effect.forever, Effect.asVoid)

const resolveBotUsername = (telegram: TelegramServiceShape): Effect.Effect<string | undefined> =>
  logAndFallback(
    pipe(
      telegram.getMe,
      Effect.map((bot) => bot.username),
      Effect.tap((username) => Effect.logInfo(`Bot started as @${username ?? "unknown"}`))
    ),
    undefined
  )

// CHANGE: compose the bot runtime program with Effect services
// WHY: run the long polling loop and the dialogue through typed effects
// FORMAT THEOREM: forall t: program(t) -> effects only through services
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError | ProfileStoreError, FileSystem | Path>
// INVARIANT: the update offset only grows, so no update is handled twice
// COMPLEXITY: O(n)/O(n)
export const program = pipe(
  loadConfig,
  Effect.flatMap((config) =>
    Effect.scoped(
      Effect.gen(function*(_) {
        const store = yield* _(makeProfileStore(config))
        const telegram = makeTelegramService(config.token)
        const botUsername = yield* _(resolveBotUsername(telegram))
        const registry = yield* _(makeSessionRegistry)
        const offset = yield* _(Ref.make(0))
        yield* _(
          loop({ config, registry, offset, botUsername }).pipe(
            Effect.provideService(ProfileStore, store),
            Effect.provideService(TelegramService, telegram)
          )
        )
      })
    )
  )
)
