import { Clock, Effect, pipe, Ref } from "effect"

import type { UserId } from "../core/brand.js"
import type { Like, Profile, RecordLikeResult } from "../core/domain.js"
import { draftProfile, mergeProfile, preferencesMatch } from "../core/domain.js"
import { ProfileNotFound, ProfileStoreError, type ProfileStoreShape } from "./profile-store.js"

export type MemoryStoreState = {
  readonly profiles: ReadonlyMap<UserId, Profile>
  readonly likes: ReadonlyMap<string, Like>
}

export const emptyMemoryState: MemoryStoreState = {
  profiles: new Map(),
  likes: new Map()
}

const likeKey = (likerId: UserId, likeeId: UserId): string => `${likerId}->${likeeId}`

const withoutLikes = (
  likes: ReadonlyMap<string, Like>,
  drop: (like: Like) => boolean
): ReadonlyMap<string, Like> => new Map([...likes].filter(([, like]) => !drop(like)))

type LikeStep =
  | { readonly kind: "ok"; readonly result: RecordLikeResult }
  | { readonly kind: "rejected"; readonly reason: string }

// CHANGE: insert a like and read the reverse like in one state transition
// WHY: Ref.modify is the single atomic step of the in-memory store
// FORMAT THEOREM: ∀s,a,b: insertLike(s,a,b).mutual ⇔ (b->a) ∈ s.likes
// PURITY: CORE
// INVARIANT: mirrors the database: no self likes, the liker exists, an inactive likee is unavailable
// COMPLEXITY: O(1)/O(1)
const insertLike = (
  state: MemoryStoreState,
  likerId: UserId,
  likeeId: UserId,
  createdAt: Date
): readonly [LikeStep, MemoryStoreState] => {
  if (likerId === likeeId) {
    return [{ kind: "rejected", reason: `Self like rejected for ${likerId}` }, state]
  }
  if (!state.profiles.has(likerId)) {
    return [{ kind: "rejected", reason: `Like references a missing profile: ${likerId} -> ${likeeId}` }, state]
  }
  if (state.profiles.get(likeeId)?.status !== "active") {
    return [{ kind: "ok", result: { status: "unavailable" } }, state]
  }
  const mutual = state.likes.has(likeKey(likeeId, likerId))
  const key = likeKey(likerId, likeeId)
  if (state.likes.has(key)) {
    return [{ kind: "ok", result: { status: "alreadyLiked", mutual } }, state]
  }
  const likes = new Map(state.likes).set(key, { likerId, likeeId, createdAt })
  return [{ kind: "ok", result: { status: "recorded", mutual } }, { ...state, likes }]
}

const isCandidate = (
  state: MemoryStoreState,
  userId: UserId,
  excluded: ReadonlySet<UserId>
) =>
(profile: Profile): boolean =>
  profile.status === "active" &&
  profile.userId !== userId &&
  !excluded.has(profile.userId) &&
  !state.likes.has(likeKey(userId, profile.userId)) &&
  preferencesMatch(state.profiles.get(userId) ?? draftProfile(userId), profile)

// CHANGE: keep profiles and likes in a single Ref
// WHY: run the bot without PostgreSQL and give tests an in-process store
// FORMAT THEOREM: ∀op: op is one Ref.get or one Ref.modify
// PURITY: SHELL
// INVARIANT: every mutating operation is a single atomic Ref.modify
// COMPLEXITY: O(n)/O(n)
export const memoryProfileStore = (ref: Ref.Ref<MemoryStoreState>): ProfileStoreShape => ({
  upsertProfile: (userId, patch) =>
    Ref.modify(ref, (state) => {
      const current = state.profiles.get(userId) ?? draftProfile(userId)
      const profile = mergeProfile(current, patch)
      return [profile, { ...state, profiles: new Map(state.profiles).set(userId, profile) }]
    }),
  getProfile: (userId) =>
    pipe(
      Ref.get(ref),
      Effect.flatMap((state) => {
        const profile = state.profiles.get(userId)
        return profile ? Effect.succeed(profile) : Effect.fail(new ProfileNotFound({ userId }))
      })
    ),
  recordLike: (likerId, likeeId) =>
    pipe(
      Clock.currentTimeMillis,
      Effect.flatMap((now) => Ref.modify(ref, (state) => insertLike(state, likerId, likeeId, new Date(now)))),
      Effect.flatMap((step) =>
        step.kind === "ok"
          ? Effect.succeed(step.result)
          : Effect.fail(new ProfileStoreError({ message: step.reason }))
      )
    ),
  removeLike: (likerId, likeeId) =>
    Ref.update(ref, (state) => ({
      ...state,
      likes: withoutLikes(state.likes, (like) => like.likerId === likerId && like.likeeId === likeeId)
    })),
  nextCandidate: (userId, excludeIds) =>
    pipe(
      Ref.get(ref),
      Effect.map((state) =>
        [...state.profiles.values()]
          .filter(isCandidate(state, userId, new Set(excludeIds)))
          .sort((left, right) => left.userId - right.userId)[0] ?? null
      )
    ),
  resetUser: (userId) =>
    Ref.update(ref, (state) => {
      const profile = state.profiles.get(userId)
      return {
        profiles: profile
          ? new Map(state.profiles).set(userId, mergeProfile(profile, { status: "draft" }))
          : state.profiles,
        likes: withoutLikes(state.likes, (like) => like.likerId === userId)
      }
    }),
  deleteUser: (userId) =>
    Ref.update(ref, (state) => {
      const profiles = new Map(state.profiles)
      profiles.delete(userId)
      return {
        profiles,
        likes: withoutLikes(state.likes, (like) => like.likerId === userId || like.likeeId === userId)
      }
    }),
  listActiveUserIds: pipe(
    Ref.get(ref),
    Effect.map((state) =>
      [...state.profiles.values()]
        .filter((profile) => profile.status === "active")
        .map((profile) => profile.userId)
        .sort((left, right) => left - right)
    )
  )
})

export const makeMemoryProfileStore = (
  initial: MemoryStoreState = emptyMemoryState
): Effect.Effect<ProfileStoreShape> => pipe(Ref.make(initial), Effect.map(memoryProfileStore))

// Snapshot of stored likes in insertion order.
export const memoryLikes = (state: MemoryStoreState): ReadonlyArray<Like> => [...state.likes.values()]
