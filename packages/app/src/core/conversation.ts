import { Either, Match } from "effect"

import type { UserId } from "./brand.js"
import type { Profile, ProfileFields } from "./domain.js"
import { isActive, profileFields } from "./domain.js"
import type { Command, ConversationInput } from "./input.js"
import {
  browseMenu,
  type Choice,
  confirmMenu,
  exhaustedMenu,
  genderMenu,
  genderOf,
  lookingForMenu,
  lookingForOf,
  mainMenu,
  type MenuRows,
  profileMenu,
  promptMenu,
  startMenu
} from "./menu.js"
import { type OutgoingMessage, photoReply, textReply } from "./reply.js"
import {
  type CollectingState,
  type ConversationSession,
  completeDraft,
  draftFromProfile,
  emptyBrowse,
  forgetLastLike,
  isInDialogue,
  passCandidate,
  type ProfileDraft
} from "./session.js"
import {
  formatProfileCard,
  promptAge,
  promptBio,
  promptGender,
  promptLookingFor,
  promptName,
  promptPhoto,
  replyBroadcastUnavailable,
  replyBroadcastUsage,
  replyConfirmPreview,
  replyDialogCancelled,
  replyHelp,
  replyLikeWithdrawn,
  replyMenu,
  replyNoProfile,
  replyNothingToCancel,
  replyNothingToUndo,
  replyOwnProfile,
  replyPickCandidateFirst,
  replyProfileDeleted,
  replyProfileSaved,
  replyResetDone,
  replyStartFirst,
  replySupport,
  replyUseMenu,
  replyValidationError,
  replyWelcomeBack,
  replyWelcomeNew
} from "./text.js"
import {
  validateAge,
  validateBio,
  validateGender,
  validateName,
  validatePhoto,
  ValidationError
} from "./validation.js"

export type DecisionContext = {
  readonly profile: Profile | null
  readonly username: string | null
  readonly isAdmin: boolean
  readonly supportLink: string | null
}

export type DialogueAction =
  | { readonly kind: "none" }
  | { readonly kind: "register"; readonly username: string | null }
  | { readonly kind: "commitProfile"; readonly fields: ProfileFields; readonly username: string | null }
  | { readonly kind: "showNextCandidate" }
  | { readonly kind: "like"; readonly targetId: UserId }
  | { readonly kind: "unlike"; readonly targetId: UserId }
  | { readonly kind: "resetProfile" }
  | { readonly kind: "deleteProfile" }
  | { readonly kind: "broadcast"; readonly text: string }

// Replies are sent only once the action has succeeded.
export type Decision = {
  readonly session: ConversationSession
  readonly replies: ReadonlyArray<OutgoingMessage>
  readonly action: DialogueAction
}

const none: DialogueAction = { kind: "none" }

const stay = (
  session: ConversationSession,
  replies: ReadonlyArray<OutgoingMessage>,
  action: DialogueAction = none
): Decision => ({ session, replies, action })

// CHANGE: describe each collecting step as data
// WHY: the steps differ only in their prompt, their buttons and the value "Keep current" copies
// PURITY: CORE
// INVARIANT: next(step) follows the fixed order name, age, gender, lookingFor, bio, photo, confirming
type CollectingStep = {
  readonly prompt: (previous: ProfileDraft | null) => string
  readonly menu: (canKeep: boolean) => MenuRows
  readonly kept: (previous: ProfileDraft | null) => ProfileDraft | null
}

const collectingSteps: Readonly<Record<CollectingState, CollectingStep>> = {
  collectingName: {
    prompt: (previous) => promptName(previous?.name),
    menu: promptMenu,
    kept: (previous) => previous?.name === undefined ? null : { name: previous.name }
  },
  collectingAge: {
    prompt: (previous) => promptAge(previous?.age),
    menu: promptMenu,
    kept: (previous) => previous?.age === undefined ? null : { age: previous.age }
  },
  collectingGender: {
    prompt: (previous) => promptGender(previous?.gender),
    menu: genderMenu,
    kept: (previous) => previous?.gender === undefined ? null : { gender: previous.gender }
  },
  collectingLookingFor: {
    prompt: (previous) => promptLookingFor(previous?.lookingFor),
    menu: lookingForMenu,
    kept: (previous) => previous?.lookingFor === undefined ? null : { lookingFor: previous.lookingFor }
  },
  collectingBio: {
    prompt: (previous) => promptBio(previous?.bio),
    menu: promptMenu,
    kept: (previous) => previous?.bio === undefined ? null : { bio: previous.bio }
  },
  collectingPhoto: {
    prompt: (previous) => promptPhoto(previous?.photoRef !== undefined),
    menu: promptMenu,
    kept: (previous) => previous?.photoRef === undefined ? null : { photoRef: previous.photoRef }
  }
}

const nextCollecting = (state: CollectingState): CollectingState | "confirming" =>
  Match.value(state).pipe(
    Match.when("collectingName", (): CollectingState => "collectingAge"),
    Match.when("collectingAge", (): CollectingState => "collectingGender"),
    Match.when("collectingGender", (): CollectingState => "collectingLookingFor"),
    Match.when("collectingLookingFor", (): CollectingState => "collectingBio"),
    Match.when("collectingBio", (): CollectingState => "collectingPhoto"),
    Match.when("collectingPhoto", () => "confirming" as const),
    Match.exhaustive
  )

const canKeep = (state: CollectingState, previous: ProfileDraft | null): boolean =>
  collectingSteps[state].kept(previous) !== null

const stepMenu = (state: CollectingState, previous: ProfileDraft | null): MenuRows =>
  collectingSteps[state].menu(canKeep(state, previous))

const promptFor = (session: ConversationSession, state: CollectingState): OutgoingMessage =>
  textReply(session.userId, collectingSteps[state].prompt(session.previous), stepMenu(state, session.previous))

const previewFor = (userId: UserId, fields: ProfileFields): OutgoingMessage =>
  photoReply(userId, fields.photoRef, replyConfirmPreview(fields), confirmMenu)

// CHANGE: advance the dialogue after a field was accepted
// WHY: the last field moves the user to the preview of the whole draft
// FORMAT THEOREM: ∀s,d: advance(s,d).draft = s.draft ∪ d
// PURITY: CORE
// INVARIANT: confirming is entered only with a complete draft
// COMPLEXITY: O(1)/O(1)
const advance = (
  session: ConversationSession,
  state: CollectingState,
  accepted: ProfileDraft
): Decision => {
  const draft = { ...session.draft, ...accepted }
  const next = nextCollecting(state)
  if (next !== "confirming") {
    const updated = { ...session, state: next, draft }
    return stay(updated, [promptFor(updated, next)])
  }
  const fields = completeDraft(draft)
  if (fields === null) {
    const restarted = { ...session, state: "collectingName" as const, draft: {} }
    return stay(restarted, [promptFor(restarted, "collectingName")])
  }
  return stay({ ...session, state: "confirming", draft }, [previewFor(session.userId, fields)])
}

const rejectField = (session: ConversationSession, state: CollectingState, error: ValidationError): Decision =>
  stay(session, [
    textReply(
      session.userId,
      replyValidationError(error, collectingSteps[state].prompt(session.previous)),
      stepMenu(state, session.previous)
    )
  ])

const acceptOrReject = <A>(
  session: ConversationSession,
  state: CollectingState,
  result: Either.Either<A, ValidationError>,
  toDraft: (value: A) => ProfileDraft
): Decision =>
  Either.match(result, {
    onLeft: (error) => rejectField(session, state, error),
    onRight: (value) => advance(session, state, toDraft(value))
  })

const notAnOption = (field: "gender" | "lookingFor"): ValidationError =>
  new ValidationError({ field, reason: "notAnOption" })

const validateText = (session: ConversationSession, state: CollectingState, text: string): Decision =>
  Match.value(state).pipe(
    Match.when("collectingName", () => acceptOrReject(session, state, validateName(text), (name) => ({ name }))),
    Match.when("collectingAge", () => acceptOrReject(session, state, validateAge(text), (age) => ({ age }))),
    Match.when("collectingGender", () => rejectField(session, state, notAnOption("gender"))),
    Match.when("collectingLookingFor", () => rejectField(session, state, notAnOption("lookingFor"))),
    Match.when("collectingBio", () => acceptOrReject(session, state, validateBio(text), (bio) => ({ bio }))),
    Match.when(
      "collectingPhoto",
      () => rejectField(session, state, new ValidationError({ field: "photo", reason: "missing" }))
    ),
    Match.exhaustive
  )

const validateChoice = (session: ConversationSession, state: CollectingState, choice: Choice): Decision =>
  Match.value(state).pipe(
    Match.when("collectingGender", () =>
      acceptOrReject(session, state, validateGender("gender", genderOf(choice)), (gender) => ({ gender }))),
    Match.when("collectingLookingFor", () =>
      acceptOrReject(
        session,
        state,
        validateGender("lookingFor", lookingForOf(choice)),
        (lookingFor) => ({ lookingFor })
      )),
    Match.orElse(() => stay(session, [promptFor(session, state)]))
  )

const handleCollecting = (
  session: ConversationSession,
  state: CollectingState,
  input: ConversationInput
): Decision => {
  if (input.kind === "text") {
    return validateText(session, state, input.text)
  }
  if (input.kind === "photo" && state === "collectingPhoto") {
    return acceptOrReject(session, state, validatePhoto(input.ref), (photoRef) => ({ photoRef }))
  }
  if (input.kind === "choice" && input.choice === "keep") {
    const kept = collectingSteps[state].kept(session.previous)
    return kept === null ? stay(session, [promptFor(session, state)]) : advance(session, state, kept)
  }
  return input.kind === "choice"
    ? validateChoice(session, state, input.choice)
    : stay(session, [promptFor(session, state)])
}

const beginEditing = (session: ConversationSession, previous: ProfileDraft | null): Decision => {
  const updated: ConversationSession = {
    ...session,
    state: "collectingName",
    draft: {},
    previous
  }
  return stay(updated, [promptFor(updated, "collectingName")])
}

const handleConfirming = (
  session: ConversationSession,
  input: ConversationInput,
  context: DecisionContext
): Decision => {
  if (input.kind !== "choice") {
    return stay(session, [textReply(session.userId, replyUseMenu(), confirmMenu)])
  }
  if (input.choice === "confirm") {
    const fields = completeDraft(session.draft)
    if (fields === null) {
      return beginEditing(session, session.previous)
    }
    return stay(
      { ...session, state: "browsing", draft: {}, previous: null },
      [textReply(session.userId, replyProfileSaved(), mainMenu)],
      { kind: "commitProfile", fields, username: context.username }
    )
  }
  if (input.choice === "edit") {
    return beginEditing(session, session.draft)
  }
  return stay(session, [textReply(session.userId, replyUseMenu(), confirmMenu)])
}

const currentMenu = (session: ConversationSession): MenuRows =>
  session.browse.current === null ? mainMenu : browseMenu(session.browse.lastLiked !== null)

const withoutCurrent = (session: ConversationSession): ConversationSession => {
  const current = session.browse.current
  return current === null ? session : { ...session, browse: passCandidate(session.browse, current) }
}

const showOwnProfile = (session: ConversationSession, profile: Profile | null): Decision => {
  const fields = profile ? profileFields(profile) : null
  return fields === null
    ? stay(session, [textReply(session.userId, replyNoProfile(), mainMenu)])
    : stay(session, [photoReply(session.userId, fields.photoRef, replyOwnProfile(fields), profileMenu)])
}

const browsingChoice = (input: ConversationInput): Choice | null => {
  if (input.kind === "choice") {
    return input.choice
  }
  if (input.kind !== "command") {
    return null
  }
  if (input.command === "browse") {
    return "browse"
  }
  return input.command === "profile" ? "myProfile" : null
}

const likeCurrent = (session: ConversationSession): Decision => {
  const current = session.browse.current
  return current === null
    ? stay(session, [textReply(session.userId, replyPickCandidateFirst(), exhaustedMenu)])
    : stay(session, [], { kind: "like", targetId: current })
}

const passCurrent = (session: ConversationSession): Decision => {
  const current = session.browse.current
  return current === null
    ? stay(session, [textReply(session.userId, replyPickCandidateFirst(), exhaustedMenu)])
    : stay({ ...session, browse: passCandidate(session.browse, current) }, [], { kind: "showNextCandidate" })
}

const undoLastLike = (session: ConversationSession): Decision => {
  const lastLiked = session.browse.lastLiked
  if (lastLiked === null) {
    return stay(session, [textReply(session.userId, replyNothingToUndo(), currentMenu(session))])
  }
  const updated = { ...session, browse: forgetLastLike(session.browse) }
  return stay(
    updated,
    [textReply(session.userId, replyLikeWithdrawn(), currentMenu(updated))],
    { kind: "unlike", targetId: lastLiked }
  )
}

const handleBrowsing = (
  session: ConversationSession,
  input: ConversationInput,
  context: DecisionContext
): Decision => {
  const userId = session.userId
  return Match.value(browsingChoice(input)).pipe(
    Match.when("browse", () => stay(withoutCurrent(session), [], { kind: "showNextCandidate" })),
    Match.when("like", () => likeCurrent(session)),
    Match.when("pass", () => passCurrent(session)),
    Match.when("undo", () => undoLastLike(session)),
    Match.when("menu", () => stay(withoutCurrent(session), [textReply(userId, replyMenu(), mainMenu)])),
    Match.when("myProfile", () => showOwnProfile(withoutCurrent(session), context.profile)),
    Match.when("editProfile", () =>
      beginEditing(
        withoutCurrent(session),
        context.profile ? draftFromProfile(context.profile) : null
      )),
    Match.when("deleteProfile", () =>
      stay(
        { ...session, state: "new", draft: {}, previous: null, browse: emptyBrowse },
        [textReply(userId, replyProfileDeleted(), startMenu)],
        { kind: "deleteProfile" }
      )),
    Match.when(
      "support",
      () => stay(session, [textReply(userId, replySupport(context.supportLink), currentMenu(session))])
    ),
    Match.orElse(() => stay(session, [textReply(userId, replyUseMenu(), currentMenu(session))]))
  )
}

const handleStart = (session: ConversationSession, context: DecisionContext): Decision => {
  const register: DialogueAction = { kind: "register", username: context.username }
  if (isActive(context.profile)) {
    return stay(
      { ...session, state: "browsing", draft: {}, previous: null },
      [textReply(session.userId, replyWelcomeBack(), mainMenu)],
      register
    )
  }
  const collecting: ConversationSession = {
    ...session,
    state: "collectingName",
    draft: {},
    previous: null
  }
  return stay(collecting, [textReply(session.userId, replyWelcomeNew(), promptMenu(false))], register)
}

const handleReset = (session: ConversationSession): Decision =>
  stay(
    { ...session, state: "resetting", draft: {}, previous: null, browse: emptyBrowse },
    [textReply(session.userId, replyResetDone(), startMenu)],
    { kind: "resetProfile" }
  )

const handleCancel = (session: ConversationSession, context: DecisionContext): Decision => {
  if (!isInDialogue(session.state)) {
    return stay(session, [textReply(session.userId, replyNothingToCancel())])
  }
  const active = isActive(context.profile)
  return stay(
    { ...session, state: active ? "browsing" : "new", draft: {}, previous: null },
    [textReply(session.userId, replyDialogCancelled(active), active ? mainMenu : startMenu)]
  )
}

const handleBroadcast = (
  session: ConversationSession,
  argument: string,
  context: DecisionContext
): Decision => {
  if (!context.isAdmin) {
    return stay(session, [textReply(session.userId, replyBroadcastUnavailable())])
  }
  return argument.length === 0
    ? stay(session, [textReply(session.userId, replyBroadcastUsage())])
    : stay(session, [], { kind: "broadcast", text: argument })
}

const globalCommands: ReadonlySet<Command> = new Set(["start", "reset", "help", "broadcast", "cancel"])

const handleGlobal = (
  session: ConversationSession,
  input: ConversationInput,
  context: DecisionContext
): Decision | null => {
  if (input.kind === "choice") {
    if (input.choice === "start") {
      return handleStart(session, context)
    }
    return input.choice === "cancel" && isInDialogue(session.state) ? handleCancel(session, context) : null
  }
  if (input.kind !== "command" || !globalCommands.has(input.command)) {
    return null
  }
  return Match.value(input.command).pipe(
    Match.when("start", () => handleStart(session, context)),
    Match.when("reset", () => handleReset(session)),
    Match.when("help", () => stay(session, [textReply(session.userId, replyHelp())])),
    Match.when("broadcast", () => handleBroadcast(session, input.argument, context)),
    Match.when("cancel", () => handleCancel(session, context)),
    Match.orElse(() => null)
  )
}

// CHANGE: decide the next dialogue step for one user input
// WHY: the state machine stays pure; storage and delivery are interpreted later
// FORMAT THEOREM: ∀s,i,c: decide(s,i,c).session.userId = s.userId
// PURITY: CORE
// INVARIANT: invalid field input never changes state or draft and never carries an action
// INVARIANT: /reset and /start are accepted from every state
// COMPLEXITY: O(1)/O(1)
export const decide = (
  session: ConversationSession,
  input: ConversationInput,
  context: DecisionContext
): Decision => {
  const global = handleGlobal(session, input, context)
  if (global) {
    return global
  }
  return Match.value(session.state).pipe(
    Match.when("new", () => stay(session, [textReply(session.userId, replyStartFirst(), startMenu)])),
    Match.when("resetting", () => stay(session, [textReply(session.userId, replyStartFirst(), startMenu)])),
    Match.when("collectingName", (state) => handleCollecting(session, state, input)),
    Match.when("collectingAge", (state) => handleCollecting(session, state, input)),
    Match.when("collectingGender", (state) => handleCollecting(session, state, input)),
    Match.when("collectingLookingFor", (state) => handleCollecting(session, state, input)),
    Match.when("collectingBio", (state) => handleCollecting(session, state, input)),
    Match.when("collectingPhoto", (state) => handleCollecting(session, state, input)),
    Match.when("confirming", () => handleConfirming(session, input, context)),
    Match.when("browsing", () => handleBrowsing(session, input, context)),
    Match.exhaustive
  )
}

// CHANGE: render a browsing candidate for the viewer
// WHY: the same card is used by browse, like and pass
// PURITY: CORE
// COMPLEXITY: O(n)/O(n)
export const candidateReply = (
  viewerId: UserId,
  candidate: Profile,
  canUndo: boolean
): OutgoingMessage => {
  const fields = profileFields(candidate)
  return fields === null
    ? textReply(
      viewerId,
      formatProfileCard({
        name: candidate.name ?? "",
        age: candidate.age ?? 0,
        bio: candidate.bio ?? "",
        gender: candidate.gender,
        lookingFor: candidate.lookingFor
      }),
      browseMenu(canUndo)
    )
    : photoReply(viewerId, fields.photoRef, formatProfileCard(fields), browseMenu(canUndo))
}
