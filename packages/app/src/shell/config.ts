import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import * as S from "@effect/schema/Schema"
import dotenv from "dotenv"
import { Data, Effect, pipe } from "effect"

import { UserId } from "../core/brand.js"

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string
}> {}

const envSchema = S.Struct({
  BOT_TOKEN: S.NonEmptyString,
  BOT_DATABASE_URL: S.optional(S.String),
  BOT_DATABASE_POOL_SIZE: S.optionalWith(S.NumberFromString.pipe(S.int(), S.between(1, 100)), {
    default: () => 10
  }),
  BOT_ADMIN_IDS: S.optionalWith(S.String, { default: () => "" }),
  BOT_SUPPORT_LINK: S.optional(S.String)
})

type Env = S.Schema.Type<typeof envSchema>

export type Config = {
  readonly token: string
  readonly databaseUrl: string | null
  readonly databasePoolSize: number
  readonly adminIds: ReadonlySet<UserId>
  readonly supportLink: string | null
}

const toConfigError = (
  error: ConfigError | Error | string
): ConfigError =>
  error instanceof ConfigError
    ? error
    : new ConfigError({
      message: error instanceof Error ? error.message : error
    })

const blankToNull = (value: string | undefined): string | null => {
  const trimmed = value?.trim() ?? ""
  return trimmed.length === 0 ? null : trimmed
}

// CHANGE: parse the comma separated list of admin user ids
// WHY: only listed users may broadcast to everyone
// FORMAT THEOREM: ∀s: parseAdminIds(s) = ok(ids) -> ∀id ∈ ids: id is a positive integer
// PURITY: CORE
// INVARIANT: a malformed entry fails the whole list
// COMPLEXITY: O(n)/O(n)
export const parseAdminIds = (raw: string): Effect.Effect<ReadonlySet<UserId>, ConfigError> => {
  const entries = raw.split(",").map((entry) => entry.trim()).filter((entry) => entry.length > 0)
  const invalid = entries.find((entry) => !/^\d+$/.test(entry))
  return invalid === undefined
    ? Effect.succeed(new Set(entries.map((entry) => UserId(Number(entry)))))
    : Effect.fail(new ConfigError({ message: `BOT_ADMIN_IDS contains an invalid id: ${invalid}` }))
}

// CHANGE: decode bot configuration from environment variables
// WHY: keep boundary data validated before entering the domain
// FORMAT THEOREM: forall env: decode(env) = config -> config.token != ""
// PURITY: SHELL
// EFFECT: Effect<Config, ConfigError, FileSystem | Path>
// INVARIANT: a blank database url means the in-memory store
// COMPLEXITY: O(1)/O(1)
const loadEnv = pipe(
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    const modulePath = yield* _(path.fromFileUrl(new URL(import.meta.url)))
    const moduleDir = path.dirname(modulePath)
    const cwd = process.cwd()
    const candidateEnvPaths = [
      path.resolve(cwd, ".env"),
      path.resolve(cwd, "../.env"),
      path.resolve(cwd, "../../.env"),
      path.resolve(moduleDir, ".env"),
      path.resolve(moduleDir, "../.env"),
      path.resolve(moduleDir, "../../.env")
    ]

    let resolvedEnvPath: string | null = null
    for (const envPath of candidateEnvPaths) {
      const exists = yield* _(fs.exists(envPath))
      if (exists) {
        resolvedEnvPath = envPath
        break
      }
    }

    if (resolvedEnvPath) {
      dotenv.config({ path: resolvedEnvPath })
    } else {
      dotenv.config()
    }
  }),
  Effect.mapError((error) => toConfigError(error instanceof Error ? error : String(error))),
  Effect.asVoid
)

export const decodeConfig = (env: Readonly<Record<string, string | undefined>>) =>
  pipe(
    S.decodeUnknown(envSchema)(env),
    Effect.mapError((error) => toConfigError(error)),
    Effect.flatMap((decoded: Env) =>
      pipe(
        parseAdminIds(decoded.BOT_ADMIN_IDS),
        Effect.map((adminIds): Config => ({
          token: decoded.BOT_TOKEN,
          databaseUrl: blankToNull(decoded.BOT_DATABASE_URL),
          databasePoolSize: decoded.BOT_DATABASE_POOL_SIZE,
          adminIds,
          supportLink: blankToNull(decoded.BOT_SUPPORT_LINK)
        }))
      )
    )
  )

export const loadConfig = pipe(
  loadEnv,
  Effect.flatMap(() => Effect.sync(() => process.env)),
  Effect.flatMap(decodeConfig)
)
