import { describe, expect, it } from "@effect/vitest"

import { PhotoRef, UserId } from "../../src/core/brand.js"
import { type DecisionContext, decide } from "../../src/core/conversation.js"
import type { Profile } from "../../src/core/domain.js"
import type { ConversationInput } from "../../src/core/input.js"
import type { Choice } from "../../src/core/menu.js"
import { type ConversationSession, newSession, presentCandidate } from "../../src/core/session.js"
import { activeProfile } from "./property-helpers.js"

const userId = UserId(1)

const context = (overrides: Partial<DecisionContext> = {}): DecisionContext => ({
  profile: null,
  username: "ann",
  isAdmin: false,
  supportLink: null,
  ...overrides
})

const text = (value: string): ConversationInput => ({ kind: "text", text: value })

const command = (name: "start" | "reset" | "cancel" | "help" | "broadcast", argument = ""): ConversationInput => ({
  kind: "command",
  command: name,
  argument
})

const choose = (choice: Choice): ConversationInput => ({
  kind: "choice",
  choice
})

const walk = (
  session: ConversationSession,
  inputs: ReadonlyArray<ConversationInput>,
  ctx: DecisionContext = context()
): ConversationSession => inputs.reduce((current, input) => decide(current, input, ctx).session, session)

const ann: Profile = activeProfile(1, "Ann", 27, "hi")

const browsing = (current: number | null = null): ConversationSession => {
  const base = newSession(userId, "active")
  return current === null ? base : { ...base, browse: presentCandidate(base.browse, UserId(current)) }
}

describe("conversation", () => {
  it("/start registers a new user and asks for the name", () => {
    const decision = decide(newSession(userId, null), command("start"), context())
    expect(decision.session.state).toBe("collectingName")
    expect(decision.action).toEqual({ kind: "register", username: "ann" })
    expect(decision.replies[0]?.text.startsWith("Hi! 👋")).toBe(true)
    expect(decision.replies[0]?.options).toEqual([["cancel"]])
  })

  it("/start with an active profile opens the main menu", () => {
    const decision = decide(newSession(userId, "active"), command("start"), context({ profile: ann }))
    expect(decision.session.state).toBe("browsing")
    expect(decision.replies[0]?.options).toEqual([["browse"], ["myProfile", "editProfile"], ["support"]])
  })

  it("collects the profile step by step", () => {
    const collectingAge = walk(newSession(userId, null), [command("start"), text("Ann")])
    expect(collectingAge.state).toBe("collectingAge")
    expect(collectingAge.draft).toEqual({ name: "Ann" })

    const rejected = decide(collectingAge, text("3"), context())
    expect(rejected.session).toEqual(collectingAge)
    expect(rejected.action).toEqual({ kind: "none" })
    expect(rejected.replies[0]?.text).toBe("Age should be between 16 and 100.\n\nHow old are you? Send a number.")

    const collectingGender = walk(collectingAge, [text("27")])
    expect(collectingGender.state).toBe("collectingGender")
    expect(decide(collectingGender, text("a girl"), context()).replies[0]).toEqual({
      userId,
      text: "Please pick one of the buttons below.\n\nWho are you?",
      options: [["iAmMale", "iAmFemale"], ["cancel"]],
      photoRef: null
    })
    expect(decide(collectingGender, choose("seekMale"), context()).session).toEqual(collectingGender)

    const collectingLookingFor = walk(collectingGender, [choose("iAmFemale")])
    expect(collectingLookingFor.state).toBe("collectingLookingFor")
    expect(collectingLookingFor.draft).toEqual({ name: "Ann", age: 27, gender: "female" })

    const collectingPhoto = walk(collectingLookingFor, [choose("seekMale"), text("hi")])
    expect(collectingPhoto.state).toBe("collectingPhoto")

    const textInsteadOfPhoto = decide(collectingPhoto, text("here it is"), context())
    expect(textInsteadOfPhoto.session.state).toBe("collectingPhoto")
    expect(textInsteadOfPhoto.replies[0]?.text).toBe(
      "I need a photo here. Send one as a picture, not as a file.\n\nSend a photo for your profile."
    )

    const preview = decide(collectingPhoto, { kind: "photo", ref: PhotoRef("p1") }, context())
    expect(preview.session.state).toBe("confirming")
    expect(preview.replies[0]).toEqual({
      userId,
      text: "This is how your profile looks:\n\n<b>Ann</b>, 27\nI'm a girl, looking for a guy\nhi\n\nSave it?",
      options: [["confirm"], ["edit"], ["cancel"]],
      photoRef: "p1"
    })

    const committed = decide(preview.session, choose("confirm"), context())
    expect(committed.session.state).toBe("browsing")
    expect(committed.session.draft).toEqual({})
    expect(committed.action).toEqual({
      kind: "commitProfile",
      fields: { name: "Ann", age: 27, bio: "hi", photoRef: "p1", gender: "female", lookingFor: "male" },
      username: "ann"
    })
  })

  it("offers the draft values again after choosing to change something", () => {
    const confirming = walk(newSession(userId, null), [
      command("start"),
      text("Ann"),
      text("27"),
      choose("iAmFemale"),
      choose("seekMale"),
      text("hi"),
      { kind: "photo", ref: PhotoRef("p1") }
    ])
    const editing = decide(confirming, choose("edit"), context())
    expect(editing.session.state).toBe("collectingName")
    expect(editing.replies[0]?.text).toBe("What name should other people see?\nCurrent: Ann")
    expect(editing.replies[0]?.options).toEqual([["keep"], ["cancel"]])

    const kept = walk(editing.session, [
      choose("keep"),
      choose("keep"),
      choose("keep"),
      choose("seekFemale"),
      text("new bio"),
      choose("keep")
    ])
    expect(kept.state).toBe("confirming")
    expect(kept.draft).toEqual({
      name: "Ann",
      age: 27,
      gender: "female",
      lookingFor: "female",
      bio: "new bio",
      photoRef: "p1"
    })
  })

  it("edits an active profile starting from the stored values", () => {
    const decision = decide(browsing(), choose("editProfile"), context({ profile: ann }))
    expect(decision.session.state).toBe("collectingName")
    expect(decision.session.previous).toEqual({ name: "Ann", age: 27, bio: "hi", photoRef: "photo-1" })
  })

  it("accepts /reset from any state", () => {
    const collecting = walk(newSession(userId, null), [command("start"), text("Ann")])
    const decision = decide(collecting, command("reset"), context())
    expect(decision.session.state).toBe("resetting")
    expect(decision.session.draft).toEqual({})
    expect(decision.action).toEqual({ kind: "resetProfile" })
    expect(decision.replies[0]?.options).toEqual([["start"]])
  })

  it("asks a new user to /start first", () => {
    const session = newSession(userId, null)
    const decision = decide(session, text("hello"), context())
    expect(decision.session).toEqual(session)
    expect(decision.replies[0]?.text).toBe("Please send /start first to create your profile.")
  })

  it("cancel returns to browsing or to the start", () => {
    const collecting = walk(newSession(userId, null), [command("start"), text("Ann")])
    expect(decide(collecting, command("cancel"), context()).session.state).toBe("new")
    expect(decide(collecting, command("cancel"), context({ profile: ann })).session.state).toBe("browsing")
    expect(decide(browsing(), command("cancel"), context({ profile: ann })).replies[0]?.text).toBe(
      "There is nothing to cancel."
    )
  })

  it("likes and passes the current candidate only", () => {
    expect(decide(browsing(), choose("like"), context({ profile: ann })).action).toEqual({ kind: "none" })
    expect(decide(browsing(7), choose("like"), context({ profile: ann })).action).toEqual({
      kind: "like",
      targetId: 7
    })
    const passed = decide(browsing(7), choose("pass"), context({ profile: ann }))
    expect(passed.action).toEqual({ kind: "showNextCandidate" })
    expect(passed.session.browse).toEqual({ current: null, seen: [7], lastLiked: null })
  })

  it("undoes the last like", () => {
    const session = { ...browsing(), browse: { current: null, seen: [UserId(7)], lastLiked: UserId(7) } }
    const decision = decide(session, choose("undo"), context({ profile: ann }))
    expect(decision.action).toEqual({ kind: "unlike", targetId: 7 })
    expect(decision.session.browse.lastLiked).toBeNull()
    expect(decision.replies[0]?.text).toBe("Your last like was withdrawn.")
  })

  it("restricts broadcast to admins with a message", () => {
    expect(decide(browsing(), command("broadcast", "hello"), context()).replies[0]?.text).toBe(
      "This command is not available."
    )
    expect(decide(browsing(), command("broadcast"), context({ isAdmin: true })).replies[0]?.text).toBe(
      "Usage: /broadcast your message text"
    )
    expect(decide(browsing(), command("broadcast", "hello"), context({ isAdmin: true })).action).toEqual({
      kind: "broadcast",
      text: "hello"
    })
  })

  it("answers /help without a transition", () => {
    const session = browsing(7)
    const decision = decide(session, command("help"), context({ profile: ann }))
    expect(decision.session).toEqual(session)
    expect(decision.action).toEqual({ kind: "none" })
  })
})
