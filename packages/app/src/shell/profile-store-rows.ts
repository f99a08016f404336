import { Effect } from "effect"

import { PhotoRef, UserId } from "../core/brand.js"
import type { Gender, Profile, ProfilePatch } from "../core/domain.js"
import { genders, profileStatuses } from "../core/domain.js"
import type { ProfileRow } from "./db/schema.js"

type ErrorHandler<E> = (error: Error | string) => E

export type ProfileInsert = {
  readonly userId: number
  readonly username?: string | null | undefined
  readonly name?: string | undefined
  readonly age?: number | undefined
  readonly bio?: string | undefined
  readonly photoRef?: string | undefined
  readonly gender?: Gender | null | undefined
  readonly lookingFor?: Gender | null | undefined
  readonly status?: Profile["status"] | undefined
}

// CHANGE: map a stored profile row into the domain profile
// WHY: rows are boundary data, so ids and statuses are checked before use
// FORMAT THEOREM: ∀r: toProfile(r) = ok(p) -> p.userId = r.userId
// PURITY: CORE
// INVARIANT: negative ages, unknown statuses and unknown genders are rejected
// COMPLEXITY: O(1)/O(1)
export const toProfile = <E>(row: ProfileRow, onError: ErrorHandler<E>): Effect.Effect<Profile, E> => {
  if (!profileStatuses.includes(row.status)) {
    return Effect.fail(onError(`Invalid profile status for ${row.userId}: ${row.status}`))
  }
  if (row.age !== null && row.age < 0) {
    return Effect.fail(onError(`Invalid age for ${row.userId}: ${row.age}`))
  }
  const unknownGender = [row.gender, row.lookingFor].find((value) => value !== null && !genders.includes(value))
  if (unknownGender !== undefined) {
    return Effect.fail(onError(`Invalid gender for ${row.userId}: ${unknownGender}`))
  }
  return Effect.succeed({
    userId: UserId(row.userId),
    username: row.username,
    name: row.name,
    age: row.age,
    bio: row.bio,
    photoRef: row.photoRef === null ? null : PhotoRef(row.photoRef),
    gender: row.gender,
    lookingFor: row.lookingFor,
    status: row.status
  })
}

// Undefined fields are left out of the update so the stored value stays.
export const toProfileInsert = (userId: UserId, patch: ProfilePatch): ProfileInsert => ({
  userId,
  username: patch.username,
  name: patch.name,
  age: patch.age,
  bio: patch.bio,
  photoRef: patch.photoRef,
  gender: patch.gender,
  lookingFor: patch.lookingFor,
  status: patch.status
})

// Both user ids in a fixed order, so A->B and B->A share one lock key.
export const pairLockKey = (first: UserId, second: UserId): string =>
  first < second ? `${first}:${second}` : `${second}:${first}`
