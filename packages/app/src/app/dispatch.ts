import { Effect, pipe } from "effect"

import type { UserId } from "../core/brand.js"
import { decide } from "../core/conversation.js"
import type { Profile } from "../core/domain.js"
import { type OutgoingMessage, textReply } from "../core/reply.js"
import { newSession } from "../core/session.js"
import {
  formatBroadcast,
  logBroadcast,
  logStepFailed,
  logTransition,
  replyBroadcastDone,
  replyTryAgain
} from "../core/text.js"
import { groupByUser, type UserEvent } from "../core/updates.js"
import type { ProfileStoreError, ProfileStoreShape } from "../shell/profile-store.js"
import type { TelegramServiceShape } from "../shell/telegram.js"
import { deliver, deliverAll } from "./delivery.js"
import { formatError, logAndFallback } from "./diagnostics.js"
import { interpretDecision, type StepResult } from "./effects.js"
import { getSession, saveSession, type SessionRegistry, withUserLock } from "./sessions.js"

export type DispatchContext = {
  readonly telegram: TelegramServiceShape
  readonly store: ProfileStoreShape
  readonly registry: SessionRegistry
  readonly adminIds: ReadonlySet<UserId>
  readonly supportLink: string | null
}

const broadcastConcurrency = 8

const loadProfile = (store: ProfileStoreShape, userId: UserId): Effect.Effect<Profile | null, ProfileStoreError> =>
  pipe(
    store.getProfile(userId),
    Effect.catchTag("ProfileNotFound", () => Effect.succeed(null))
  )

// CHANGE: run one dialogue step for one user event
// WHY: the session is committed only after the store work of the step succeeded
// FORMAT THEOREM: ∀e: step(e) fails -> session(e.userId) is unchanged
// PURITY: SHELL
// EFFECT: Effect<StepResult, ProfileStoreError>
// INVARIANT: a user without a session gets one rebuilt from the stored profile status
// COMPLEXITY: O(1)/O(1)
const runStep = (context: DispatchContext, event: UserEvent): Effect.Effect<StepResult, ProfileStoreError> =>
  Effect.gen(function*(_) {
    const profile = yield* _(loadProfile(context.store, event.userId))
    const existing = yield* _(getSession(context.registry, event.userId))
    const session = existing ?? newSession(event.userId, profile?.status ?? null)
    const decision = decide(session, event.input, {
      profile,
      username: event.username,
      isAdmin: context.adminIds.has(event.userId),
      supportLink: context.supportLink
    })
    const result = yield* _(interpretDecision(context.store, decision, profile))
    yield* _(saveSession(context.registry, result.session))
    yield* _(Effect.logInfo(logTransition(event.userId, event.input, session.state, result.session.state)))
    return result
  })

const failedStep = (event: UserEvent, error: ProfileStoreError): Effect.Effect<StepResult> =>
  pipe(
    Effect.logError(logStepFailed(event.userId, formatError(error))),
    Effect.as({
      session: newSession(event.userId, null),
      replies: [textReply(event.userId, replyTryAgain())],
      broadcast: null
    })
  )

// CHANGE: send an admin's text to every active user and report the count back
// WHY: operators need one way to reach everybody who finished a profile
// FORMAT THEOREM: ∀t: broadcast(t) reports sent <= total
// PURITY: SHELL
// EFFECT: Effect<void, never, never>
// INVARIANT: a failed delivery to one user does not stop the others
// COMPLEXITY: O(n)/O(n)
const runBroadcast = (context: DispatchContext, adminId: UserId, text: string): Effect.Effect<void> =>
  Effect.gen(function*(_) {
    const recipients = yield* _(logAndFallback(context.store.listActiveUserIds, []))
    const results = yield* _(
      Effect.forEach(
        recipients,
        (userId) => deliver(context.telegram, textReply(userId, formatBroadcast(text))),
        { concurrency: broadcastConcurrency }
      )
    )
    const sent = results.filter(Boolean).length
    yield* _(Effect.logInfo(logBroadcast(sent, recipients.length)))
    yield* _(deliver(context.telegram, textReply(adminId, replyBroadcastDone(sent, recipients.length))))
  })

// CHANGE: process one event under the user's lock and deliver its replies
// WHY: one user's inputs never interleave, other users are never blocked
// FORMAT THEOREM: ∀e: dispatch(e) never fails
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<OutgoingMessage>, never, never>
// INVARIANT: a store failure yields a retry reply and leaves the session as it was
// INVARIANT: the lock covers the step only, replies are sent after it is released
// COMPLEXITY: O(1)/O(1)
export const dispatchEvent = (
  context: DispatchContext,
  event: UserEvent
): Effect.Effect<ReadonlyArray<OutgoingMessage>> =>
  Effect.gen(function*(_) {
    const result = yield* _(
      withUserLock(
        context.registry,
        event.userId,
        pipe(
          runStep(context, event),
          Effect.catchAll((error) => failedStep(event, error))
        )
      )
    )
    yield* _(deliverAll(context.telegram, result.replies))
    if (result.broadcast !== null) {
      yield* _(runBroadcast(context, event.userId, result.broadcast))
    }
    return result.replies
  })

// CHANGE: dispatch a batch with per-user order and cross-user concurrency
// WHY: a slow user must not hold up everybody else in the same poll
// FORMAT THEOREM: ∀b,u: events of u in b are handled in arrival order
// PURITY: SHELL
// EFFECT: Effect<void, never, never>
// INVARIANT: groups run concurrently, events inside a group sequentially
// COMPLEXITY: O(n)/O(n)
export const dispatchBatch = (
  context: DispatchContext,
  events: ReadonlyArray<UserEvent>
): Effect.Effect<void> =>
  Effect.forEach(
    groupByUser(events),
    (group) => Effect.forEach(group, (event) => dispatchEvent(context, event), { discard: true }),
    { concurrency: "unbounded", discard: true }
  )
