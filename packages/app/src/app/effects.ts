import { Effect, Match, pipe } from "effect"

import type { UserId } from "../core/brand.js"
import { candidateReply, type Decision, type DialogueAction } from "../core/conversation.js"
import type { Profile } from "../core/domain.js"
import { exhaustedMenu } from "../core/menu.js"
import { type OutgoingMessage, photoReply, textReply } from "../core/reply.js"
import { type ConversationSession, likeCandidate, passCandidate, presentCandidate } from "../core/session.js"
import {
  formatProfileCard,
  logMatchFormed,
  logStepFailed,
  replyInvalidTarget,
  replyMatch,
  replyNoCandidates,
  replyTryAgain
} from "../core/text.js"
import type { ProfileStoreError, ProfileStoreShape } from "../shell/profile-store.js"
import { formatError } from "./diagnostics.js"
import { like, nextCandidate, reset, unlike } from "./matching.js"

export type StepResult = {
  readonly session: ConversationSession
  readonly replies: ReadonlyArray<OutgoingMessage>
  // Sent after the user's lock is released.
  readonly broadcast: string | null
}

const done = (
  session: ConversationSession,
  replies: ReadonlyArray<OutgoingMessage>,
  broadcast: string | null = null
): StepResult => ({ session, replies, broadcast })

// CHANGE: show the next candidate or announce the end of the cycle
// WHY: browse, like and pass all end by presenting the next profile
// FORMAT THEOREM: ∀s: showNext(s).session.browse.current = candidate id ∨ null
// PURITY: SHELL
// EFFECT: Effect<StepResult, ProfileStoreError>
// INVARIANT: a presented candidate is added to the cycle's seen list
// COMPLEXITY: O(log n)/O(1)
const showNext = (
  store: ProfileStoreShape,
  session: ConversationSession,
  replies: ReadonlyArray<OutgoingMessage>
): Effect.Effect<StepResult, ProfileStoreError> =>
  pipe(
    nextCandidate(store, session.userId, session.browse),
    Effect.map(({ browse, candidate }) => {
      if (candidate === null) {
        return done(
          { ...session, browse },
          [...replies, textReply(session.userId, replyNoCandidates(), exhaustedMenu)]
        )
      }
      const presented = presentCandidate(browse, candidate.userId)
      return done(
        { ...session, browse: presented },
        [...replies, candidateReply(session.userId, candidate, presented.lastLiked !== null)]
      )
    })
  )

const matchNotice = (recipientId: UserId, counterpart: Profile): OutgoingMessage => {
  const card = formatProfileCard({
    name: counterpart.name ?? "",
    age: counterpart.age ?? 0,
    bio: counterpart.bio ?? "",
    gender: counterpart.gender,
    lookingFor: counterpart.lookingFor
  })
  const text = replyMatch(counterpart, card)
  return counterpart.photoRef === null
    ? textReply(recipientId, text)
    : photoReply(recipientId, counterpart.photoRef, text)
}

const loadProfile = (store: ProfileStoreShape, userId: UserId): Effect.Effect<Profile | null, ProfileStoreError> =>
  pipe(
    store.getProfile(userId),
    Effect.catchTag("ProfileNotFound", () => Effect.succeed(null))
  )

// A match is already stored here, so a failed read must not cost the notices.
const likerProfile = (
  store: ProfileStoreShape,
  likerId: UserId,
  known: Profile | null
): Effect.Effect<Profile | null> =>
  known === null
    ? pipe(loadProfile(store, likerId), Effect.orElseSucceed(() => null))
    : Effect.succeed(known)

// CHANGE: build the two match notifications, one per party
// WHY: each side learns who the other is and how to reach them
// FORMAT THEOREM: ∀a,b: notices(a,b) = [to a about b, to b about a]
// PURITY: CORE
// INVARIANT: a party whose profile vanished gets no notice
// COMPLEXITY: O(1)/O(1)
const matchNotices = (liker: Profile | null, likee: Profile): ReadonlyArray<OutgoingMessage> =>
  liker === null ? [] : [matchNotice(liker.userId, likee), matchNotice(likee.userId, liker)]

// CHANGE: announce a stored match, then try to move on to the next candidate
// WHY: once recordLike reported the match nothing else may hide it from either side
// FORMAT THEOREM: ∀s: announceMatch(s) never fails with ProfileStoreError
// PURITY: SHELL
// EFFECT: Effect<StepResult>
// INVARIANT: the notices are part of every result, a failed lookup only adds a retry reply
// COMPLEXITY: O(log n)/O(1)
const announceMatch = (
  store: ProfileStoreShape,
  session: ConversationSession,
  replies: ReadonlyArray<OutgoingMessage>,
  viewer: Profile | null,
  likee: Profile
): Effect.Effect<StepResult> =>
  pipe(
    Effect.logInfo(logMatchFormed(session.userId, likee.userId)),
    Effect.zipRight(likerProfile(store, session.userId, viewer)),
    Effect.flatMap((liker) => {
      const liked = { ...session, browse: likeCandidate(session.browse, likee.userId) }
      const announced = [...replies, ...matchNotices(liker, likee)]
      return pipe(
        showNext(store, liked, announced),
        Effect.catchAll((error) =>
          pipe(
            Effect.logError(logStepFailed(session.userId, formatError(error))),
            Effect.as(done(liked, [...announced, textReply(session.userId, replyTryAgain())]))
          )
        )
      )
    })
  )

const handleLike = (
  store: ProfileStoreShape,
  session: ConversationSession,
  replies: ReadonlyArray<OutgoingMessage>,
  viewer: Profile | null,
  targetId: UserId
): Effect.Effect<StepResult, ProfileStoreError> =>
  pipe(
    like(store, session.userId, targetId),
    Effect.flatMap(({ likee, outcome }) =>
      Match.value(outcome).pipe(
        Match.when({ kind: "matchFormed" }, () => announceMatch(store, session, replies, viewer, likee)),
        Match.when({ kind: "liked" }, () =>
          showNext(store, { ...session, browse: likeCandidate(session.browse, targetId) }, replies)),
        Match.when({ kind: "noOp" }, () =>
          showNext(store, { ...session, browse: passCandidate(session.browse, targetId) }, replies)),
        Match.exhaustive
      )
    ),
    Effect.catchTag("InvalidTarget", () =>
      showNext(
        store,
        { ...session, browse: passCandidate(session.browse, targetId) },
        [...replies, textReply(session.userId, replyInvalidTarget())]
      ))
  )

// CHANGE: carry out the storage side of a dialogue decision
// WHY: decide stays pure; this is the only place a step touches the store
// FORMAT THEOREM: ∀d: interpret(d) fails -> no session is committed by the caller
// PURITY: SHELL
// EFFECT: Effect<StepResult, ProfileStoreError>
// INVARIANT: the decision's own replies come before any reply produced here
// COMPLEXITY: O(1)/O(1)
export const interpretDecision = (
  store: ProfileStoreShape,
  decision: Decision,
  viewer: Profile | null
): Effect.Effect<StepResult, ProfileStoreError> => {
  const { replies, session } = decision
  const userId = session.userId
  return Match.value<DialogueAction>(decision.action).pipe(
    Match.when({ kind: "none" }, () => Effect.succeed(done(session, replies))),
    Match.when({ kind: "register" }, (action) =>
      pipe(
        store.upsertProfile(userId, { username: action.username }),
        Effect.as(done(session, replies))
      )),
    Match.when({ kind: "commitProfile" }, (action) =>
      pipe(
        store.upsertProfile(userId, { ...action.fields, username: action.username, status: "active" }),
        Effect.as(done(session, replies))
      )),
    Match.when({ kind: "showNextCandidate" }, () => showNext(store, session, replies)),
    Match.when({ kind: "like" }, (action) => handleLike(store, session, replies, viewer, action.targetId)),
    Match.when({ kind: "unlike" }, (action) =>
      pipe(
        unlike(store, userId, action.targetId),
        Effect.as(done(session, replies))
      )),
    Match.when({ kind: "resetProfile" }, () =>
      pipe(
        reset(store, userId, session.browse),
        Effect.map((browse) => done({ ...session, state: "new", browse }, replies))
      )),
    Match.when({ kind: "deleteProfile" }, () =>
      pipe(
        store.deleteUser(userId),
        Effect.as(done(session, replies))
      )),
    Match.when({ kind: "broadcast" }, (action) => Effect.succeed(done(session, replies, action.text))),
    Match.exhaustive
  )
}
