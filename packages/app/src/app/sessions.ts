import { Effect, pipe, Ref, SynchronizedRef } from "effect"

import type { UserId } from "../core/brand.js"
import type { ConversationSession } from "../core/session.js"

export type SessionRegistry = {
  readonly sessions: Ref.Ref<ReadonlyMap<UserId, ConversationSession>>
  readonly locks: SynchronizedRef.SynchronizedRef<ReadonlyMap<UserId, Effect.Semaphore>>
}

export const makeSessionRegistry: Effect.Effect<SessionRegistry> = Effect.gen(function*(_) {
  const sessions = yield* _(Ref.make<ReadonlyMap<UserId, ConversationSession>>(new Map()))
  const locks = yield* _(SynchronizedRef.make<ReadonlyMap<UserId, Effect.Semaphore>>(new Map()))
  return { sessions, locks }
})

// CHANGE: hand out one single-permit semaphore per user, created on first use
// WHY: a user's inputs run one at a time while other users proceed
// FORMAT THEOREM: ∀r,u: lockFor(r,u) returns the same semaphore on every call
// PURITY: SHELL
// EFFECT: Effect<Semaphore>
// INVARIANT: creation is serialized by the SynchronizedRef, so no user gets two locks
// COMPLEXITY: O(1)/O(1)
const lockFor = (registry: SessionRegistry, userId: UserId): Effect.Effect<Effect.Semaphore> =>
  SynchronizedRef.modifyEffect(registry.locks, (locks) => {
    const existing = locks.get(userId)
    return existing
      ? Effect.succeed([existing, locks] as const)
      : pipe(
        Effect.makeSemaphore(1),
        Effect.map((created) => [created, new Map(locks).set(userId, created)] as const)
      )
  })

export const withUserLock = <A, E, R>(
  registry: SessionRegistry,
  userId: UserId,
  effect: Effect.Effect<A, E, R>
): Effect.Effect<A, E, R> =>
  pipe(
    lockFor(registry, userId),
    Effect.flatMap((lock) => lock.withPermits(1)(effect))
  )

export const getSession = (
  registry: SessionRegistry,
  userId: UserId
): Effect.Effect<ConversationSession | null> =>
  pipe(
    Ref.get(registry.sessions),
    Effect.map((sessions) => sessions.get(userId) ?? null)
  )

export const saveSession = (registry: SessionRegistry, session: ConversationSession): Effect.Effect<void> =>
  Ref.update(registry.sessions, (sessions) => new Map(sessions).set(session.userId, session))
