// CHANGE: introduce branded identifiers to keep domain ids distinct without unsafe casts
// WHY: user ids, message ids and photo references are all plain primitives on the wire
// FORMAT THEOREM: forall x in IdDomain: brand(x) -> preserves(value(x))
// PURITY: CORE
// INVARIANT: brands are only created in this axiomatic module
// COMPLEXITY: O(1)/O(1)
export type Brand<T, Name extends string> = T & { readonly __brand: Name }

export type UserId = Brand<number, "UserId">
export type MessageId = Brand<number, "MessageId">
export type PhotoRef = Brand<string, "PhotoRef">

// CHANGE: provide constructors for branded identifiers at the boundary
// WHY: ensure ids are created explicitly and never mixed by accident
// FORMAT THEOREM: forall n in Number: UserId(n) = n ∧ type(UserId(n)) = UserId
// PURITY: CORE
// INVARIANT: branding does not change runtime representation
// COMPLEXITY: O(1)/O(1)
export const UserId = (value: number): UserId => value as UserId

export const MessageId = (value: number): MessageId => value as MessageId

// CHANGE: provide constructors for photo references
// WHY: a profile stores the transport's file reference, never the media itself
// FORMAT THEOREM: forall s in String: PhotoRef(s) = s
// PURITY: CORE
// INVARIANT: reference string stays unchanged
// COMPLEXITY: O(1)/O(1)
export const PhotoRef = (value: string): PhotoRef => value as PhotoRef
