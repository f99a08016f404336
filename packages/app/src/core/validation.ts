import { Data, Either } from "effect"

import type { PhotoRef } from "./brand.js"
import type { Gender } from "./domain.js"

export type ProfileField = "name" | "age" | "gender" | "lookingFor" | "bio" | "photo"

export type ValidationReason = "tooShort" | "tooLong" | "notANumber" | "outOfRange" | "missing" | "notAnOption"

export class ValidationError extends Data.TaggedError("ValidationError")<{
  readonly field: ProfileField
  readonly reason: ValidationReason
}> {}

export const nameLength = { min: 2, max: 40 } as const
export const bioLength = { min: 2, max: 500 } as const
export const ageRange = { min: 16, max: 100 } as const

const checkLength = (
  field: ProfileField,
  text: string,
  bounds: { readonly min: number; readonly max: number }
): Either.Either<string, ValidationError> => {
  const trimmed = text.trim()
  if (trimmed.length < bounds.min) {
    return Either.left(new ValidationError({ field, reason: "tooShort" }))
  }
  if (trimmed.length > bounds.max) {
    return Either.left(new ValidationError({ field, reason: "tooLong" }))
  }
  return Either.right(trimmed)
}

export const validateName = (text: string): Either.Either<string, ValidationError> =>
  checkLength("name", text, nameLength)

export const validateBio = (text: string): Either.Either<string, ValidationError> => checkLength("bio", text, bioLength)

// CHANGE: parse an age answer into a bounded integer
// WHY: the dialogue accepts only whole years within a plausible adult range
// FORMAT THEOREM: ∀t: right(validateAge(t)) = n -> digits(trim(t)) ∧ 16 <= n <= 100
// PURITY: CORE
// INVARIANT: signs, decimals and separators are rejected as notANumber
// COMPLEXITY: O(n)/O(1)
export const validateAge = (text: string): Either.Either<number, ValidationError> => {
  const trimmed = text.trim()
  if (!/^\d{1,3}$/.test(trimmed)) {
    return Either.left(new ValidationError({ field: "age", reason: "notANumber" }))
  }
  const age = Number.parseInt(trimmed, 10)
  return age < ageRange.min || age > ageRange.max
    ? Either.left(new ValidationError({ field: "age", reason: "outOfRange" }))
    : Either.right(age)
}

export const validatePhoto = (ref: PhotoRef): Either.Either<PhotoRef, ValidationError> =>
  ref.trim().length === 0
    ? Either.left(new ValidationError({ field: "photo", reason: "missing" }))
    : Either.right(ref)

// Gender answers come only from the buttons; anything else is not an option.
export const validateGender = (
  field: "gender" | "lookingFor",
  answer: Gender | null
): Either.Either<Gender, ValidationError> =>
  answer === null
    ? Either.left(new ValidationError({ field, reason: "notAnOption" }))
    : Either.right(answer)
