import { Data, Effect, pipe } from "effect"

import type { UserId } from "../core/brand.js"
import { type LikeOutcome, likeOutcome, type Profile } from "../core/domain.js"
import { type BrowseCursor, endCycle } from "../core/session.js"
import type { ProfileStoreError, ProfileStoreShape } from "../shell/profile-store.js"

export class InvalidTarget extends Data.TaggedError("InvalidTarget")<{
  readonly likerId: UserId
  readonly likeeId: UserId
  readonly reason: "self" | "missing" | "inactive"
}> {}

const findProfile = (store: ProfileStoreShape, userId: UserId): Effect.Effect<Profile | null, ProfileStoreError> =>
  pipe(
    store.getProfile(userId),
    Effect.catchTag("ProfileNotFound", () => Effect.succeed(null))
  )

export type LikeResult = {
  readonly outcome: LikeOutcome
  // Read before the like; used for the match notice.
  readonly likee: Profile
}

// CHANGE: record a like and report whether it completed a match
// WHY: the match is detected by the store's atomic insert-and-check, never by a separate read
// FORMAT THEOREM: ∀a,b: like(a,b).outcome = matchFormed -> Like(a,b) ∧ Like(b,a)
// PURITY: SHELL
// EFFECT: Effect<LikeResult, InvalidTarget | ProfileStoreError>
// INVARIANT: an invalid target causes no mutation
// INVARIANT: activity is decided by the store inside the insert, the read only finds missing targets
// COMPLEXITY: O(1)/O(1)
export const like = (
  store: ProfileStoreShape,
  likerId: UserId,
  likeeId: UserId
): Effect.Effect<LikeResult, InvalidTarget | ProfileStoreError> =>
  Effect.gen(function*(_) {
    if (likerId === likeeId) {
      return yield* _(Effect.fail(new InvalidTarget({ likerId, likeeId, reason: "self" })))
    }
    const likee = yield* _(findProfile(store, likeeId))
    if (likee === null) {
      return yield* _(Effect.fail(new InvalidTarget({ likerId, likeeId, reason: "missing" })))
    }
    const result = yield* _(store.recordLike(likerId, likeeId))
    if (result.status === "unavailable") {
      return yield* _(Effect.fail(new InvalidTarget({ likerId, likeeId, reason: "inactive" })))
    }
    return { outcome: likeOutcome(likerId, likeeId, result), likee }
  })

export type NextCandidate = {
  readonly candidate: Profile | null
  readonly browse: BrowseCursor
}

// CHANGE: fetch the next candidate for the session's current cycle
// WHY: passes only last for one cycle, so exhaustion clears them
// FORMAT THEOREM: ∀s: next(s).candidate = null -> next(s).browse.seen = []
// PURITY: SHELL
// EFFECT: Effect<NextCandidate, ProfileStoreError>
// INVARIANT: the candidate is active, not the requester and not liked by the requester
// COMPLEXITY: O(log n)/O(1)
export const nextCandidate = (
  store: ProfileStoreShape,
  userId: UserId,
  browse: BrowseCursor
): Effect.Effect<NextCandidate, ProfileStoreError> =>
  pipe(
    store.nextCandidate(userId, browse.seen),
    Effect.map((candidate) => candidate === null ? { candidate, browse: endCycle(browse) } : { candidate, browse })
  )

export const reset = (
  store: ProfileStoreShape,
  userId: UserId,
  browse: BrowseCursor
): Effect.Effect<BrowseCursor, ProfileStoreError> =>
  pipe(
    store.resetUser(userId),
    Effect.as({ ...endCycle(browse), lastLiked: null })
  )

export const unlike = (
  store: ProfileStoreShape,
  likerId: UserId,
  likeeId: UserId
): Effect.Effect<void, ProfileStoreError> => store.removeLike(likerId, likeeId)
