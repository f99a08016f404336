import { Effect, pipe } from "effect"

import { choiceLabels, type MenuRows } from "../core/menu.js"
import type { OutgoingMessage } from "../core/reply.js"
import { logDeliveryFailed } from "../core/text.js"
import type { Keyboard, TelegramServiceShape } from "../shell/telegram.js"
import { formatError } from "./diagnostics.js"

export const toKeyboard = (options: MenuRows | null): Keyboard =>
  options === null ? null : options.map((row) => row.map((choice) => choiceLabels[choice]))

// CHANGE: deliver one outgoing message and report whether it arrived
// WHY: a failed delivery is logged and never undoes the step that produced it
// FORMAT THEOREM: ∀m: deliver(m) ∈ {true, false}
// PURITY: SHELL
// EFFECT: Effect<boolean, never, never>
// INVARIANT: transport errors never escape
// COMPLEXITY: O(1)/O(1)
export const deliver = (
  telegram: TelegramServiceShape,
  message: OutgoingMessage
): Effect.Effect<boolean> => {
  const keyboard = toKeyboard(message.options)
  const send = message.photoRef === null
    ? telegram.sendMessage(message.userId, message.text, keyboard)
    : telegram.sendPhoto(message.userId, message.photoRef, message.text, keyboard)
  return pipe(
    send,
    Effect.as(true),
    Effect.catchAll((error) =>
      pipe(
        Effect.logError(logDeliveryFailed(message.userId, formatError(error))),
        Effect.as(false)
      )
    )
  )
}

export const deliverAll = (
  telegram: TelegramServiceShape,
  messages: ReadonlyArray<OutgoingMessage>
): Effect.Effect<number> =>
  pipe(
    Effect.forEach(messages, (message) => deliver(telegram, message)),
    Effect.map((results) => results.filter(Boolean).length)
  )
