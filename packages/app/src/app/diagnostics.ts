import { Effect, pipe } from "effect"

import {
  formatUpdateLog,
  logTelegramNoUpdates,
  logTelegramReceivedUpdates,
  logTelegramUpdate
} from "../core/text.js"
import type { IncomingUpdate } from "../core/updates.js"

export const logUpdates = (
  updates: ReadonlyArray<IncomingUpdate>
): Effect.Effect<void> =>
  Effect.gen(function*(_) {
    if (updates.length === 0) {
      yield* _(Effect.logDebug(logTelegramNoUpdates()))
      return
    }
    yield* _(Effect.logInfo(logTelegramReceivedUpdates(updates.length)))
    for (const update of updates) {
      yield* _(Effect.logInfo(logTelegramUpdate(formatUpdateLog(update))))
    }
  })

export type LoggableError =
  | Error
  | string
  | {
    readonly _tag?: string
    readonly message?: string
    readonly description?: string
    readonly errorCode?: number
    readonly method?: string
  }

type TaggedError = {
  readonly _tag?: string
  readonly message?: string
  readonly description?: string
  readonly errorCode?: number
  readonly method?: string
}

const hasTag = (error: LoggableError): error is TaggedError => typeof error !== "string" && "_tag" in error

const formatCode = (error: TaggedError): string => error.errorCode === undefined ? "" : ` code=${error.errorCode}`

const formatMethod = (error: TaggedError): string => error.method ? ` method=${error.method}` : ""

const formatTaggedError = (error: TaggedError): string => {
  const tag = error._tag ?? "UnknownError"
  const message = error.message || error.description || ""
  const base = message ? `${tag}: ${message}` : tag
  return `${base}${formatCode(error)}${formatMethod(error)}`
}

// CHANGE: render any failure of the bot as a single log line
// WHY: tagged errors carry their details in fields, plain errors in name and message
// FORMAT THEOREM: ∀e: formatError(e) starts with tag(e) when e is tagged
// PURITY: CORE
// INVARIANT: never throws
// COMPLEXITY: O(1)/O(1)
export const formatError = (error: LoggableError): string => {
  if (typeof error === "string") {
    return error
  }
  if (hasTag(error)) {
    return formatTaggedError(error)
  }
  return `${error.name}: ${error.message}`
}

export const logAndFallback = <A, E extends LoggableError, R>(
  effect: Effect.Effect<A, E, R>,
  fallback: A
): Effect.Effect<A, never, R> =>
  effect.pipe(
    Effect.matchEffect({
      onFailure: (error) =>
        pipe(
          Effect.logError(formatError(error)),
          Effect.as(fallback)
        ),
      onSuccess: (value) => Effect.succeed(value)
    })
  )
