import { Context, Data, type Effect } from "effect"

import type { UserId } from "../core/brand.js"
import type { Profile, ProfilePatch, RecordLikeResult } from "../core/domain.js"

export class ProfileStoreError extends Data.TaggedError("ProfileStoreError")<{
  readonly message: string
}> {}

export class ProfileNotFound extends Data.TaggedError("ProfileNotFound")<{
  readonly userId: UserId
}> {}

const formatCause = (cause: Error["cause"]): string | null => {
  if (cause instanceof Error) {
    return cause.message
  }
  if (typeof cause === "string") {
    return cause
  }
  if (typeof cause === "number" || typeof cause === "boolean" || typeof cause === "bigint") {
    return `${cause}`
  }
  if (cause === null) {
    return "null"
  }
  if (cause === undefined) {
    return null
  }
  return "unknown"
}

const formatErrorMessage = (error: Error | string): string => {
  if (typeof error === "string") {
    return error
  }
  const base = error.message
  const causeMessage = formatCause(error.cause)
  return causeMessage ? `${base}; cause: ${causeMessage}` : base
}

export const toStoreError = (
  error: ProfileStoreError | Error | string
): ProfileStoreError =>
  error instanceof ProfileStoreError
    ? error
    : new ProfileStoreError({
      message: formatErrorMessage(error)
    })

// CHANGE: expose exactly the atomic operations the matching engine needs
// WHY: callers never compose several calls into a read-modify-write
// PURITY: SHELL
// INVARIANT: recordLike checks the likee, inserts and checks the reverse like in one atomic step
// INVARIANT: every failure is a ProfileStoreError for the single call
export type ProfileStoreShape = {
  readonly upsertProfile: (userId: UserId, patch: ProfilePatch) => Effect.Effect<Profile, ProfileStoreError>
  readonly getProfile: (userId: UserId) => Effect.Effect<Profile, ProfileNotFound | ProfileStoreError>
  readonly recordLike: (likerId: UserId, likeeId: UserId) => Effect.Effect<RecordLikeResult, ProfileStoreError>
  readonly removeLike: (likerId: UserId, likeeId: UserId) => Effect.Effect<void, ProfileStoreError>
  readonly nextCandidate: (
    userId: UserId,
    excludeIds: ReadonlyArray<UserId>
  ) => Effect.Effect<Profile | null, ProfileStoreError>
  readonly resetUser: (userId: UserId) => Effect.Effect<void, ProfileStoreError>
  readonly deleteUser: (userId: UserId) => Effect.Effect<void, ProfileStoreError>
  readonly listActiveUserIds: Effect.Effect<ReadonlyArray<UserId>, ProfileStoreError>
}

export class ProfileStore extends Context.Tag("ProfileStore")<
  ProfileStore,
  ProfileStoreShape
>() {}
