import type { PhotoRef, UserId } from "./brand.js"

export type ProfileStatus = "draft" | "active" | "hidden"

export const profileStatuses: ReadonlyArray<ProfileStatus> = ["draft", "active", "hidden"]

export type Gender = "male" | "female"

export const genders: ReadonlyArray<Gender> = ["male", "female"]

export type Profile = {
  readonly userId: UserId
  readonly username: string | null
  readonly name: string | null
  readonly age: number | null
  readonly bio: string | null
  readonly photoRef: PhotoRef | null
  readonly gender: Gender | null
  readonly lookingFor: Gender | null
  readonly status: ProfileStatus
}

export type ProfilePatch = {
  readonly username?: string | null | undefined
  readonly name?: string | undefined
  readonly age?: number | undefined
  readonly bio?: string | undefined
  readonly photoRef?: PhotoRef | undefined
  readonly gender?: Gender | null | undefined
  readonly lookingFor?: Gender | null | undefined
  readonly status?: ProfileStatus | undefined
}

// Fields a profile needs before it can become active.
export type ProfileFields = {
  readonly name: string
  readonly age: number
  readonly bio: string
  readonly photoRef: PhotoRef
  readonly gender: Gender | null
  readonly lookingFor: Gender | null
}

export type Preferences = Pick<Profile, "gender" | "lookingFor">

export type Like = {
  readonly likerId: UserId
  readonly likeeId: UserId
  readonly createdAt: Date
}

// unavailable: the likee was missing or not active when the like was attempted.
export type RecordLikeResult =
  | {
    readonly status: "recorded" | "alreadyLiked"
    readonly mutual: boolean
  }
  | {
    readonly status: "unavailable"
  }

export type LikeOutcome =
  | {
    readonly kind: "matchFormed"
    readonly likerId: UserId
    readonly likeeId: UserId
  }
  | {
    readonly kind: "liked"
    readonly likerId: UserId
    readonly likeeId: UserId
  }
  | {
    readonly kind: "noOp"
  }

// CHANGE: provide a pure initializer for a freshly registered profile
// WHY: a profile row exists from the first /start, before any field is known
// FORMAT THEOREM: forall id: draftProfile(id).status = draft
// PURITY: CORE
// INVARIANT: every field except the id and username is empty
// COMPLEXITY: O(1)/O(1)
export const draftProfile = (userId: UserId, username: string | null = null): Profile => ({
  userId,
  username,
  name: null,
  age: null,
  bio: null,
  photoRef: null,
  gender: null,
  lookingFor: null,
  status: "draft"
})

// CHANGE: merge a patch into a stored profile
// WHY: upserts write only the fields a dialogue step produced
// FORMAT THEOREM: forall p,d: k in keys(d) ∧ d[k] != undefined -> merge(p,d)[k] = d[k]
// PURITY: CORE
// INVARIANT: userId is never changed by a patch
// COMPLEXITY: O(1)/O(1)
export const mergeProfile = (profile: Profile, patch: ProfilePatch): Profile => ({
  userId: profile.userId,
  username: patch.username === undefined ? profile.username : patch.username,
  name: patch.name ?? profile.name,
  age: patch.age ?? profile.age,
  bio: patch.bio ?? profile.bio,
  photoRef: patch.photoRef ?? profile.photoRef,
  gender: patch.gender === undefined ? profile.gender : patch.gender,
  lookingFor: patch.lookingFor === undefined ? profile.lookingFor : patch.lookingFor,
  status: patch.status ?? profile.status
})

export const profileFields = (profile: Profile): ProfileFields | null =>
  profile.name !== null && profile.age !== null && profile.bio !== null && profile.photoRef !== null
    ? {
      name: profile.name,
      age: profile.age,
      bio: profile.bio,
      photoRef: profile.photoRef,
      gender: profile.gender,
      lookingFor: profile.lookingFor
    }
    : null

export const isActive = (profile: Profile | null): boolean => profile?.status === "active"

// CHANGE: decide whether two people are looking for each other
// WHY: a candidate is shown only when both sides' wishes allow it
// FORMAT THEOREM: ∀v,c: compatible(v,c) ⇔ accepts(v.lookingFor, c.gender) ∧ accepts(c.lookingFor, v.gender)
// PURITY: CORE
// INVARIANT: an unknown gender or an unset wish never excludes anybody
// COMPLEXITY: O(1)/O(1)
export const preferencesMatch = (viewer: Preferences, candidate: Preferences): boolean => {
  const accepts = (wish: Gender | null, gender: Gender | null) => wish === null || gender === null || wish === gender
  return accepts(viewer.lookingFor, candidate.gender) && accepts(candidate.lookingFor, viewer.gender)
}

// CHANGE: classify the store's answer to a like
// WHY: only the call that inserted the second like of a pair reports the match
// FORMAT THEOREM: ∀r: outcome(r) = matchFormed ⇔ r.status = recorded ∧ r.mutual
// PURITY: CORE
// INVARIANT: alreadyLiked is always noOp, mutual or not
// COMPLEXITY: O(1)/O(1)
export const likeOutcome = (
  likerId: UserId,
  likeeId: UserId,
  result: Exclude<RecordLikeResult, { readonly status: "unavailable" }>
): LikeOutcome => {
  if (result.status === "alreadyLiked") {
    return { kind: "noOp" }
  }
  return result.mutual ? { kind: "matchFormed", likerId, likeeId } : { kind: "liked", likerId, likeeId }
}
