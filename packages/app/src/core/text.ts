import { Match } from "effect"

import type { UserId } from "./brand.js"
import type { Gender, Preferences, Profile, ProfileFields } from "./domain.js"
import type { ConversationInput } from "./input.js"
import type { ConversationState } from "./session.js"
import type { IncomingUpdate } from "./updates.js"
import { ageRange, bioLength, nameLength, type ValidationError } from "./validation.js"

const escapeHtml = (value: string): string =>
  value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll("\"", "&quot;")
    .replaceAll("'", "&#39;")

const genderWords: Readonly<Record<Gender, string>> = { male: "a guy", female: "a girl" }

const formatGender = (gender: Gender): string => genderWords[gender]

const preferencesLine = ({ gender, lookingFor }: Partial<Preferences>): string | null => {
  if (gender && lookingFor) {
    return `I'm ${formatGender(gender)}, looking for ${formatGender(lookingFor)}`
  }
  if (gender) {
    return `I'm ${formatGender(gender)}`
  }
  return lookingFor ? `Looking for ${formatGender(lookingFor)}` : null
}

// CHANGE: render a profile as the card shown to other users
// WHY: browsing, previews and match notices share one layout
// FORMAT THEOREM: ∀f: card(f) = "name, age\n[preferences\n]bio" with user text escaped
// PURITY: CORE
// INVARIANT: user supplied text is always HTML-escaped
// COMPLEXITY: O(n)/O(n)
export const formatProfileCard = (
  fields: Pick<ProfileFields, "name" | "age" | "bio"> & Partial<Preferences>
): string => {
  const preferences = preferencesLine(fields)
  const header = `<b>${escapeHtml(fields.name)}</b>, ${fields.age}`
  return preferences === null
    ? `${header}\n${escapeHtml(fields.bio)}`
    : `${header}\n${preferences}\n${escapeHtml(fields.bio)}`
}

// Broadcast text is sent as HTML like every other reply.
export const formatBroadcast = (text: string): string => escapeHtml(text)

const contactUrl = (profile: Profile): string =>
  profile.username && /^\w+$/u.test(profile.username)
    ? `https://t.me/${profile.username}`
    : `tg://user?id=${profile.userId}`

export const formatContactLink = (profile: Profile): string =>
  `<a href="${escapeHtml(contactUrl(profile))}">${escapeHtml(profile.name ?? "your match")}</a>`

const currentValueLine = (value: string | number | undefined): string =>
  value === undefined ? "" : `\nCurrent: ${escapeHtml(String(value))}`

export const replyWelcomeNew = (): string =>
  [
    "Hi! 👋 I help people here get to know each other.",
    "",
    "Let's fill in your profile: a name, your age, who you are and who you want to meet, a few words and a photo.",
    "You can stop at any time with Cancel.",
    "",
    "First, what name should other people see?"
  ].join("\n")

export const replyWelcomeBack = (): string =>
  [
    "Welcome back! 👋",
    "",
    "🔎 Browse profiles: see who is around.",
    "👤 My profile: check how others see you.",
    "✏️ Edit profile: update your details.",
    "Send /reset to start over from scratch."
  ].join("\n")

export const promptName = (previous?: string): string =>
  `What name should other people see?${currentValueLine(previous)}`

export const promptAge = (previous?: number): string => `How old are you? Send a number.${currentValueLine(previous)}`

const currentGenderLine = (value: Gender | undefined): string =>
  value === undefined ? "" : `\nCurrent: ${formatGender(value)}`

export const promptGender = (previous?: Gender): string => `Who are you?${currentGenderLine(previous)}`

export const promptLookingFor = (previous?: Gender): string =>
  `Who would you like to meet?${currentGenderLine(previous)}`

export const promptBio = (previous?: string): string =>
  `Write a few words about yourself.${currentValueLine(previous)}`

export const promptPhoto = (hasPrevious: boolean): string =>
  hasPrevious
    ? "Send a photo for your profile, or keep the current one."
    : "Send a photo for your profile."

const validationHint = (error: ValidationError): string =>
  Match.value(error.field).pipe(
    Match.when("name", () => `The name should be ${nameLength.min} to ${nameLength.max} characters long.`),
    Match.when("age", () =>
      error.reason === "notANumber"
        ? "Please send your age as a whole number."
        : `Age should be between ${ageRange.min} and ${ageRange.max}.`),
    Match.when("gender", () => "Please pick one of the buttons below."),
    Match.when("lookingFor", () => "Please pick one of the buttons below."),
    Match.when("bio", () => `The description should be ${bioLength.min} to ${bioLength.max} characters long.`),
    Match.when("photo", () => "I need a photo here. Send one as a picture, not as a file."),
    Match.exhaustive
  )

export const replyValidationError = (error: ValidationError, prompt: string): string =>
  `${validationHint(error)}\n\n${prompt}`

export const replyConfirmPreview = (fields: ProfileFields): string =>
  `This is how your profile looks:\n\n${formatProfileCard(fields)}\n\nSave it?`

export const replyProfileSaved = (): string => "Done! Your profile is saved. You can browse other profiles now."

export const replyOwnProfile = (fields: ProfileFields): string => `Your profile:\n\n${formatProfileCard(fields)}`

export const replyNoProfile = (): string => "You don't have a profile yet. Send /start to create one."

export const replyStartFirst = (): string => "Please send /start first to create your profile."

export const replyUseMenu = (): string => "I didn't get that. Please use the menu buttons below."

export const replyMenu = (): string => "Main menu."

export const replyHelp = (): string =>
  [
    "/start: create your profile or open the menu",
    "/browse: show the next profile",
    "/myprofile: show your profile",
    "/cancel: stop filling in the profile",
    "/reset: delete your likes and fill in the profile again"
  ].join("\n")

export const replyDialogCancelled = (hasActiveProfile: boolean): string =>
  hasActiveProfile
    ? "Editing stopped. Your saved profile is unchanged."
    : "Profile setup stopped. Send /start whenever you want to continue."

export const replyNothingToCancel = (): string => "There is nothing to cancel."

export const replyResetDone = (): string =>
  "Your profile and likes were reset. Tap Start to fill in your profile again."

export const replyProfileDeleted = (): string => "Your profile is deleted. Send /start when you want to create a new one."

export const replyPickCandidateFirst = (): string => "Open a profile with 🔎 Browse profiles first."

export const replyNoCandidates = (): string => "No new profiles right now. Check back later!"

export const replyInvalidTarget = (): string => "This profile is no longer available."

export const replyLikeWithdrawn = (): string => "Your last like was withdrawn."

export const replyNothingToUndo = (): string => "There is no like to undo."

export const replyMatch = (counterpart: Profile, card: string): string =>
  [
    "It's a match! 🎉 Have a great time.",
    "",
    `Say hi 👉 ${formatContactLink(counterpart)}`,
    "",
    card
  ].join("\n")

export const replySupport = (link: string | null): string =>
  link ? `Need help? Write to support: ${escapeHtml(link)}` : "Need help? Send /help to see what I can do."

export const replyTryAgain = (): string => "Something went wrong on my side. Please try again in a moment."

export const replyBroadcastUnavailable = (): string => "This command is not available."

export const replyBroadcastUsage = (): string => "Usage: /broadcast your message text"

export const replyBroadcastDone = (sent: number, total: number): string =>
  `Broadcast finished: delivered to ${sent} of ${total} users.`

export const logTelegramNoUpdates = (): string => "Telegram: no updates"

export const logTelegramReceivedUpdates = (count: number): string => `Telegram: received ${count} update(s)`

export const logTelegramUpdate = (line: string): string => `Telegram update: ${line}`

export const formatUpdateLog = (update: IncomingUpdate): string => {
  const message = update.message
  if (!message) {
    return `id=${update.updateId} kind=other`
  }
  const kind = message.photoRef === undefined ? "text" : "photo"
  return `id=${update.updateId} kind=${kind} chat=${message.chatType} from=${message.from.id}`
}

const describeInput = (input: ConversationInput): string =>
  Match.value(input).pipe(
    Match.when({ kind: "command" }, (command) => `command:${command.command}`),
    Match.when({ kind: "choice" }, (choice) => `choice:${choice.choice}`),
    Match.orElse((other) => other.kind)
  )

export const logTransition = (
  userId: UserId,
  input: ConversationInput,
  from: ConversationState,
  to: ConversationState
): string => `Dialogue: user=${userId} input=${describeInput(input)} ${from} -> ${to}`

export const logMatchFormed = (likerId: UserId, likeeId: UserId): string => `Match formed: ${likerId} <-> ${likeeId}`

export const logDeliveryFailed = (userId: UserId, reason: string): string =>
  `Delivery to user=${userId} failed: ${reason}`

export const logStepFailed = (userId: UserId, reason: string): string => `Dialogue step for user=${userId} failed: ${reason}`

export const logBroadcast = (sent: number, total: number): string => `Broadcast delivered to ${sent}/${total}`
