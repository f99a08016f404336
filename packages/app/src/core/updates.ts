import type { PhotoRef, UserId } from "./brand.js"
import { type ConversationInput, parseInput } from "./input.js"

export type ChatType = "private" | "group" | "supergroup" | "channel"

export type Sender = {
  readonly id: UserId
  readonly firstName: string
  readonly username?: string | undefined
}

export type ChatMessage = {
  readonly chatType: ChatType
  readonly from: Sender
  readonly text?: string | undefined
  readonly photoRef?: PhotoRef | undefined
}

export type IncomingUpdate = {
  readonly updateId: number
  readonly message?: ChatMessage | undefined
}

export type UserEvent = {
  readonly updateId: number
  readonly userId: UserId
  readonly username: string | null
  readonly input: ConversationInput
}

// CHANGE: compute the next long polling offset from a batch
// WHY: acknowledged updates must never be delivered twice
// FORMAT THEOREM: forall o,us: nextOffset(o,us) >= o
// PURITY: CORE
// INVARIANT: the offset is monotonic
// COMPLEXITY: O(n)/O(1)
export const nextOffset = (offset: number, updates: ReadonlyArray<IncomingUpdate>): number =>
  updates.reduce((acc, update) => Math.max(acc, update.updateId + 1), offset)

// CHANGE: turn private chat messages into per-user dialogue events
// WHY: the dialogue is one-to-one, group chatter is never an input
// FORMAT THEOREM: ∀u ∈ result: source(u).message.chatType = private
// PURITY: CORE
// INVARIANT: arrival order is preserved
// COMPLEXITY: O(n)/O(n)
export const toUserEvents = (
  updates: ReadonlyArray<IncomingUpdate>,
  botUsername?: string
): ReadonlyArray<UserEvent> =>
  updates.flatMap((update) => {
    const message = update.message
    if (!message || message.chatType !== "private") {
      return []
    }
    return [{
      updateId: update.updateId,
      userId: message.from.id,
      username: message.from.username ?? null,
      input: parseInput(message, botUsername)
    }]
  })

// CHANGE: group a batch by user keeping each user's arrival order
// WHY: one user's events run in sequence while different users run side by side
// FORMAT THEOREM: ∀g ∈ groupByUser(es): g is a subsequence of es with one userId
// PURITY: CORE
// INVARIANT: groups are ordered by each user's first event
// COMPLEXITY: O(n)/O(n)
export const groupByUser = (
  events: ReadonlyArray<UserEvent>
): ReadonlyArray<ReadonlyArray<UserEvent>> => {
  const groups = new Map<UserId, Array<UserEvent>>()
  for (const event of events) {
    const group = groups.get(event.userId)
    if (group) {
      group.push(event)
    } else {
      groups.set(event.userId, [event])
    }
  }
  return [...groups.values()]
}
