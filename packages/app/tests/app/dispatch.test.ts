import { describe, expect, it } from "@effect/vitest"
import { Effect, Ref } from "effect"

import { dispatchBatch, dispatchEvent } from "../../src/app/dispatch.js"
import { getSession, withUserLock } from "../../src/app/sessions.js"
import type { DispatchContext } from "../../src/app/dispatch.js"
import { PhotoRef, UserId } from "../../src/core/brand.js"
import type { Gender } from "../../src/core/domain.js"
import { choiceLabels } from "../../src/core/menu.js"
import { replyWelcomeNew } from "../../src/core/text.js"
import {
  emptyMemoryState,
  memoryLikes,
  memoryProfileStore,
  type MemoryStoreState
} from "../../src/shell/profile-store-memory.js"
import type { ProfileStoreShape } from "../../src/shell/profile-store.js"
import { activePatch } from "../core/property-helpers.js"
import {
  makeDispatchContext,
  makeEvent,
  makeFailingStore,
  makeTelegramStub,
  type StoreOperation,
  textEvent
} from "./test-utils.js"

const seedActive = (store: ProfileStoreShape, id: number, name: string) =>
  store.upsertProfile(UserId(id), activePatch(id, name))

const annOnboarding = [
  textEvent(1, "/start", "ann"),
  textEvent(1, "Ann", "ann"),
  textEvent(1, "27", "ann"),
  textEvent(1, choiceLabels.iAmFemale, "ann"),
  textEvent(1, choiceLabels.seekMale, "ann"),
  textEvent(1, "hi", "ann"),
  makeEvent(1, { kind: "photo", ref: PhotoRef("ann-photo") }, "ann"),
  textEvent(1, choiceLabels.confirm, "ann")
]

const matchText =
  "It's a match! 🎉 Have a great time.\n\nSay hi 👉 <a href=\"https://t.me/bea\">Bea</a>\n\n<b>Bea</b>, 30\nlikes long walks"

const annMatchText =
  "It's a match! 🎉 Have a great time.\n\nSay hi 👉 <a href=\"https://t.me/ann\">Ann</a>\n\n<b>Ann</b>, 30\nlikes long walks"

const tryAgainText = "Something went wrong on my side. Please try again in a moment."

describe("dispatch", () => {
  it.effect("Ann registers, browses B, and both are told about the match", () =>
    Effect.gen(function*(_) {
      const ref = yield* _(Ref.make<MemoryStoreState>(emptyMemoryState))
      const store = memoryProfileStore(ref)
      yield* _(seedActive(store, 2, "Bea"))
      const { context, stub } = yield* _(makeDispatchContext({ store }))

      for (const event of annOnboarding) {
        yield* _(dispatchEvent(context, event))
      }
      expect((yield* _(store.getProfile(UserId(1)))).status).toBe("active")

      const shown = yield* _(dispatchEvent(context, textEvent(1, choiceLabels.browse)))
      expect(shown).toEqual([
        {
          userId: 1,
          text: "<b>Bea</b>, 30\nlikes long walks",
          options: [["like", "pass"], ["menu"]],
          photoRef: "photo-2"
        }
      ])

      const liked = yield* _(dispatchEvent(context, textEvent(1, choiceLabels.like)))
      expect(liked.map((reply) => reply.text)).toEqual(["No new profiles right now. Check back later!"])

      yield* _(dispatchEvent(context, textEvent(2, "/start", "bea")))
      const annCard = yield* _(dispatchEvent(context, textEvent(2, choiceLabels.browse, "bea")))
      expect(annCard[0]?.photoRef).toBe("ann-photo")
      yield* _(dispatchEvent(context, textEvent(2, choiceLabels.like, "bea")))

      const noticesForAnn = stub.sentTo(1).filter((call) => call.text.startsWith("It's a match!"))
      const noticesForBea = stub.sentTo(2).filter((call) => call.text.startsWith("It's a match!"))
      expect(noticesForAnn.map((call) => call.text)).toEqual([matchText])
      expect(noticesForAnn[0]?.photoRef).toBe("photo-2")
      expect(noticesForBea).toHaveLength(1)
      expect(noticesForBea[0]?.text.endsWith("<b>Ann</b>, 27\nI'm a girl, looking for a guy\nhi")).toBe(true)

      const pairs = memoryLikes(yield* _(Ref.get(ref))).map((like) => `${like.likerId}->${like.likeeId}`).sort()
      expect(pairs).toEqual(["1->2", "2->1"])
    }))

  it.effect("runs one user's events in order within a batch", () =>
    Effect.gen(function*(_) {
      const { context, stub } = yield* _(makeDispatchContext())
      yield* _(
        dispatchBatch(context, [
          textEvent(1, "/start"),
          textEvent(3, "/start"),
          textEvent(1, "Ann"),
          textEvent(1, "27")
        ])
      )
      expect((yield* _(getSession(context.registry, UserId(1))))?.state).toBe("collectingGender")
      expect((yield* _(getSession(context.registry, UserId(3))))?.state).toBe("collectingName")
      expect(stub.sentTo(1).map((call) => call.text)).toEqual([
        replyWelcomeNew(),
        "How old are you? Send a number.",
        "Who are you?"
      ])
    }))

  it.effect("a store failure answers with a retry reply and keeps the session", () =>
    Effect.gen(function*(_) {
      const base = memoryProfileStore(yield* _(Ref.make<MemoryStoreState>(emptyMemoryState)))
      yield* _(seedActive(base, 1, "Ann"))
      yield* _(seedActive(base, 2, "Bea"))
      const failing = new Set<StoreOperation>()
      const { context } = yield* _(makeDispatchContext({ store: makeFailingStore(base, failing) }))

      yield* _(dispatchEvent(context, textEvent(1, "/start")))
      const before = yield* _(getSession(context.registry, UserId(1)))
      failing.add("nextCandidate")
      const replies = yield* _(dispatchEvent(context, textEvent(1, choiceLabels.browse)))
      expect(replies.map((reply) => reply.text)).toEqual([tryAgainText])
      expect(yield* _(getSession(context.registry, UserId(1)))).toEqual(before)
    }))

  it.effect("both sides hear about a stored match even when the next lookup fails", () =>
    Effect.gen(function*(_) {
      const ref = yield* _(Ref.make<MemoryStoreState>(emptyMemoryState))
      const base = memoryProfileStore(ref)
      yield* _(seedActive(base, 1, "Ann"))
      yield* _(seedActive(base, 2, "Bea"))
      yield* _(base.recordLike(UserId(1), UserId(2)))
      const failing = new Set<StoreOperation>()
      const { context, stub } = yield* _(makeDispatchContext({ store: makeFailingStore(base, failing) }))

      yield* _(dispatchEvent(context, textEvent(2, choiceLabels.browse)))
      failing.add("nextCandidate")
      const replies = yield* _(dispatchEvent(context, textEvent(2, choiceLabels.like)))

      expect(replies.map((reply) => reply.text)).toEqual([annMatchText, matchText, tryAgainText])
      expect(stub.sentTo(1).map((call) => call.text)).toEqual([matchText])
      expect((yield* _(getSession(context.registry, UserId(2))))?.browse.lastLiked).toBe(1)
      expect(memoryLikes(yield* _(Ref.get(ref)))).toHaveLength(2)
    }))

  it.effect("sends replies after the user's lock is released", () =>
    Effect.gen(function*(_) {
      const { context, stub } = yield* _(makeDispatchContext())
      const lockedSend: DispatchContext = {
        ...context,
        telegram: {
          ...stub.telegram,
          sendMessage: (userId, text, keyboard) =>
            withUserLock(context.registry, userId, stub.telegram.sendMessage(userId, text, keyboard))
        }
      }
      yield* _(dispatchEvent(lockedSend, textEvent(1, "/start")))
      expect(stub.sentTo(1).map((call) => call.text)).toEqual([replyWelcomeNew()])
    }))

  it.effect("shows only candidates whose wishes fit both ways", () =>
    Effect.gen(function*(_) {
      const { context } = yield* _(makeDispatchContext())
      const seed = (id: number, name: string, gender: Gender, lookingFor: Gender) =>
        context.store.upsertProfile(UserId(id), { ...activePatch(id, name), gender, lookingFor })
      yield* _(seed(1, "Ann", "female", "male"))
      yield* _(seed(2, "Bea", "female", "male"))
      yield* _(seed(3, "Cid", "male", "male"))
      yield* _(seed(4, "Dan", "male", "female"))

      const shown = yield* _(dispatchEvent(context, textEvent(1, choiceLabels.browse)))
      expect(shown.map((reply) => reply.photoRef)).toEqual(["photo-4"])
      const next = yield* _(dispatchEvent(context, textEvent(1, choiceLabels.pass)))
      expect(next.map((reply) => reply.text)).toEqual(["No new profiles right now. Check back later!"])
    }))

  it.effect("a failed delivery never undoes the match", () =>
    Effect.gen(function*(_) {
      const ref = yield* _(Ref.make<MemoryStoreState>(emptyMemoryState))
      const store = memoryProfileStore(ref)
      yield* _(seedActive(store, 1, "Ann"))
      yield* _(seedActive(store, 2, "Bea"))
      yield* _(store.recordLike(UserId(1), UserId(2)))
      const stub = makeTelegramStub({ unreachable: new Set([UserId(1)]) })
      const { context } = yield* _(makeDispatchContext({ store, telegram: stub.telegram }))

      yield* _(dispatchEvent(context, textEvent(2, choiceLabels.browse)))
      yield* _(dispatchEvent(context, textEvent(2, choiceLabels.like)))

      expect(stub.sentTo(1)).toEqual([])
      expect(stub.sentTo(2).filter((call) => call.text.startsWith("It's a match!"))).toHaveLength(1)
      expect(memoryLikes(yield* _(Ref.get(ref)))).toHaveLength(2)
    }))

  it.effect("reset from the middle of the dialogue returns to the start", () =>
    Effect.gen(function*(_) {
      const { context } = yield* _(makeDispatchContext())
      yield* _(dispatchEvent(context, textEvent(1, "/start")))
      yield* _(dispatchEvent(context, textEvent(1, "Ann")))
      const replies = yield* _(dispatchEvent(context, textEvent(1, "/reset")))
      expect(replies[0]?.options).toEqual([["start"]])
      const session = yield* _(getSession(context.registry, UserId(1)))
      expect(session?.state).toBe("new")
      expect(session?.draft).toEqual({})
      expect((yield* _(context.store.getProfile(UserId(1)))).status).toBe("draft")
    }))

  it.effect("admins broadcast to every active user", () =>
    Effect.gen(function*(_) {
      const { context, stub } = yield* _(makeDispatchContext({ adminIds: [100] }))
      yield* _(seedActive(context.store, 2, "Bea"))
      yield* _(seedActive(context.store, 3, "Cid"))

      yield* _(dispatchEvent(context, textEvent(100, "/broadcast Hello everyone")))

      expect(stub.sentTo(2).map((call) => call.text)).toEqual(["Hello everyone"])
      expect(stub.sentTo(3).map((call) => call.text)).toEqual(["Hello everyone"])
      expect(stub.sentTo(100).map((call) => call.text)).toEqual([
        "Broadcast finished: delivered to 2 of 2 users."
      ])
    }))

  it.effect("broadcast text is escaped like every other reply", () =>
    Effect.gen(function*(_) {
      const { context, stub } = yield* _(makeDispatchContext({ adminIds: [100] }))
      yield* _(seedActive(context.store, 2, "Bea"))

      yield* _(dispatchEvent(context, textEvent(100, "/broadcast Tom & Jerry: a < b")))

      expect(stub.sentTo(2).map((call) => call.text)).toEqual(["Tom &amp; Jerry: a &lt; b"])
    }))
})
