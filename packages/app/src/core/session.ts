import type { PhotoRef, UserId } from "./brand.js"
import type { Gender, Profile, ProfileFields, ProfileStatus } from "./domain.js"

export type ConversationState =
  | "new"
  | "collectingName"
  | "collectingAge"
  | "collectingGender"
  | "collectingLookingFor"
  | "collectingBio"
  | "collectingPhoto"
  | "confirming"
  | "browsing"
  | "resetting"

export type CollectingState =
  | "collectingName"
  | "collectingAge"
  | "collectingGender"
  | "collectingLookingFor"
  | "collectingBio"
  | "collectingPhoto"

export type ProfileDraft = {
  readonly name?: string | undefined
  readonly age?: number | undefined
  readonly gender?: Gender | undefined
  readonly lookingFor?: Gender | undefined
  readonly bio?: string | undefined
  readonly photoRef?: PhotoRef | undefined
}

export type BrowseCursor = {
  readonly current: UserId | null
  readonly seen: ReadonlyArray<UserId>
  readonly lastLiked: UserId | null
}

export type ConversationSession = {
  readonly userId: UserId
  readonly state: ConversationState
  readonly draft: ProfileDraft
  readonly previous: ProfileDraft | null
  readonly browse: BrowseCursor
}

export const emptyBrowse: BrowseCursor = {
  current: null,
  seen: [],
  lastLiked: null
}

// CHANGE: rebuild a session from the persisted profile status
// WHY: sessions live in memory only and are recreated after a restart
// FORMAT THEOREM: ∀id,s: newSession(id,s).state = browsing ⇔ s = active
// PURITY: CORE
// INVARIANT: a new session carries no draft and no browsing history
// COMPLEXITY: O(1)/O(1)
export const newSession = (userId: UserId, status: ProfileStatus | null): ConversationSession => ({
  userId,
  state: status === "active" ? "browsing" : "new",
  draft: {},
  previous: null,
  browse: emptyBrowse
})

export const isCollecting = (state: ConversationState): state is CollectingState =>
  state === "collectingName" || state === "collectingAge" || state === "collectingGender" ||
  state === "collectingLookingFor" || state === "collectingBio" || state === "collectingPhoto"

export const isInDialogue = (state: ConversationState): boolean => isCollecting(state) || state === "confirming"

export const draftFromProfile = (profile: Profile): ProfileDraft => ({
  name: profile.name ?? undefined,
  age: profile.age ?? undefined,
  gender: profile.gender ?? undefined,
  lookingFor: profile.lookingFor ?? undefined,
  bio: profile.bio ?? undefined,
  photoRef: profile.photoRef ?? undefined
})

// CHANGE: check that a draft holds every field an active profile needs
// WHY: status becomes active only after all fields passed validation
// FORMAT THEOREM: ∀d: complete(d) != null ⇔ every draft field is defined
// PURITY: CORE
// INVARIANT: the result never contains undefined fields
// COMPLEXITY: O(1)/O(1)
export const completeDraft = (draft: ProfileDraft): ProfileFields | null =>
  draft.name !== undefined && draft.age !== undefined && draft.gender !== undefined &&
    draft.lookingFor !== undefined && draft.bio !== undefined && draft.photoRef !== undefined
    ? {
      name: draft.name,
      age: draft.age,
      bio: draft.bio,
      photoRef: draft.photoRef,
      gender: draft.gender,
      lookingFor: draft.lookingFor
    }
    : null

const withSeen = (seen: ReadonlyArray<UserId>, userId: UserId): ReadonlyArray<UserId> =>
  seen.includes(userId) ? seen : [...seen, userId]

// CHANGE: present a candidate and advance the browsing cursor
// WHY: a shown candidate must not be shown again in the same cycle
// FORMAT THEOREM: ∀b,id: id ∈ present(b,id).seen ∧ present(b,id).current = id
// PURITY: CORE
// INVARIANT: seen has no duplicates
// COMPLEXITY: O(n)/O(n)
export const presentCandidate = (browse: BrowseCursor, candidateId: UserId): BrowseCursor => ({
  ...browse,
  current: candidateId,
  seen: withSeen(browse.seen, candidateId)
})

export const passCandidate = (browse: BrowseCursor, candidateId: UserId): BrowseCursor => ({
  ...browse,
  current: browse.current === candidateId ? null : browse.current,
  seen: withSeen(browse.seen, candidateId)
})

export const likeCandidate = (browse: BrowseCursor, candidateId: UserId): BrowseCursor => ({
  current: browse.current === candidateId ? null : browse.current,
  seen: withSeen(browse.seen, candidateId),
  lastLiked: candidateId
})

export const forgetLastLike = (browse: BrowseCursor): BrowseCursor => ({ ...browse, lastLiked: null })

// Cycle end: the whole pool becomes available again.
export const endCycle = (browse: BrowseCursor): BrowseCursor => ({
  ...browse,
  current: null,
  seen: []
})
