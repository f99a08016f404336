import { describe, expect, it } from "@effect/vitest"
import { Effect, Either, Ref } from "effect"

import { UserId } from "../../src/core/brand.js"
import type { Gender } from "../../src/core/domain.js"
import {
  emptyMemoryState,
  memoryLikes,
  memoryProfileStore,
  type MemoryStoreState
} from "../../src/shell/profile-store-memory.js"
import type { ProfileStoreShape } from "../../src/shell/profile-store.js"
import { activePatch } from "../core/property-helpers.js"

const seeded = (ids: ReadonlyArray<number>) =>
  Effect.gen(function*(_) {
    const ref = yield* _(Ref.make<MemoryStoreState>(emptyMemoryState))
    const store = memoryProfileStore(ref)
    for (const id of ids) {
      yield* _(store.upsertProfile(UserId(id), activePatch(id, `User${id}`)))
    }
    return { ref, store }
  })

const likePairs = (state: MemoryStoreState): ReadonlyArray<string> =>
  memoryLikes(state).map((like) => `${like.likerId}->${like.likeeId}`).sort()

const candidateIds = (store: ProfileStoreShape, userId: number, exclude: ReadonlyArray<number> = []) =>
  Effect.gen(function*(_) {
    const shown: Array<number> = []
    let excluded = exclude.map(UserId)
    for (;;) {
      const next = yield* _(store.nextCandidate(UserId(userId), excluded))
      if (next === null) {
        return shown
      }
      shown.push(next.userId)
      excluded = [...excluded, next.userId]
    }
  })

describe("memory profile store", () => {
  it.effect("creates a draft profile on first upsert and merges later patches", () =>
    Effect.gen(function*(_) {
      const { store } = yield* _(seeded([]))
      const created = yield* _(store.upsertProfile(UserId(1), { username: "ann" }))
      expect(created.status).toBe("draft")
      expect(created.name).toBeNull()
      const named = yield* _(store.upsertProfile(UserId(1), { name: "Ann" }))
      expect(named.username).toBe("ann")
      expect(named.name).toBe("Ann")
    }))

  it.effect("fails with ProfileNotFound for unknown users", () =>
    Effect.gen(function*(_) {
      const { store } = yield* _(seeded([]))
      const result = yield* _(Effect.either(store.getProfile(UserId(404))))
      expect(Either.isLeft(result) && result.left._tag).toBe("ProfileNotFound")
    }))

  it.effect("reports a mutual like exactly once, on the second call", () =>
    Effect.gen(function*(_) {
      const { store } = yield* _(seeded([1, 2]))
      const first = yield* _(store.recordLike(UserId(1), UserId(2)))
      const again = yield* _(store.recordLike(UserId(1), UserId(2)))
      const second = yield* _(store.recordLike(UserId(2), UserId(1)))
      const repeated = yield* _(store.recordLike(UserId(2), UserId(1)))
      expect(first).toEqual({ status: "recorded", mutual: false })
      expect(again).toEqual({ status: "alreadyLiked", mutual: false })
      expect(second).toEqual({ status: "recorded", mutual: true })
      expect(repeated).toEqual({ status: "alreadyLiked", mutual: true })
    }))

  it.effect("concurrent mutual likes produce both likes and a single match", () =>
    Effect.gen(function*(_) {
      const { ref, store } = yield* _(seeded([1, 2]))
      const results = yield* _(
        Effect.all([store.recordLike(UserId(1), UserId(2)), store.recordLike(UserId(2), UserId(1))], {
          concurrency: "unbounded"
        })
      )
      const matches = results.filter((result) => result.status === "recorded" && result.mutual)
      expect(matches).toHaveLength(1)
      expect(likePairs(yield* _(Ref.get(ref)))).toEqual(["1->2", "2->1"])
    }))

  it.effect("rejects self likes without storing them", () =>
    Effect.gen(function*(_) {
      const { ref, store } = yield* _(seeded([1]))
      const result = yield* _(Effect.either(store.recordLike(UserId(1), UserId(1))))
      expect(Either.isLeft(result) && result.left._tag).toBe("ProfileStoreError")
      expect(likePairs(yield* _(Ref.get(ref)))).toEqual([])
    }))

  it.effect("reports a draft or missing likee as unavailable and stores nothing", () =>
    Effect.gen(function*(_) {
      const { ref, store } = yield* _(seeded([1]))
      yield* _(store.upsertProfile(UserId(2), { name: "Draft" }))
      expect(yield* _(store.recordLike(UserId(1), UserId(2)))).toEqual({ status: "unavailable" })
      expect(yield* _(store.recordLike(UserId(1), UserId(404)))).toEqual({ status: "unavailable" })
      expect(likePairs(yield* _(Ref.get(ref)))).toEqual([])
    }))

  it.effect("shows a candidate only when both gender wishes allow it", () =>
    Effect.gen(function*(_) {
      const { store } = yield* _(seeded([1, 2, 3, 4, 5]))
      const prefer = (id: number, gender: Gender, lookingFor: Gender) =>
        store.upsertProfile(UserId(id), { gender, lookingFor })
      yield* _(prefer(1, "female", "male"))
      yield* _(prefer(2, "female", "male"))
      yield* _(prefer(3, "male", "female"))
      yield* _(prefer(4, "male", "male"))
      expect(yield* _(candidateIds(store, 1))).toEqual([3, 5])
      expect(yield* _(candidateIds(store, 5))).toEqual([1, 2, 3, 4])
    }))

  it.effect("scans candidates in id order, skipping self, liked and inactive profiles", () =>
    Effect.gen(function*(_) {
      const { store } = yield* _(seeded([4, 1, 3, 2, 5]))
      yield* _(store.upsertProfile(UserId(5), { status: "hidden" }))
      yield* _(store.upsertProfile(UserId(6), { name: "Draft" }))
      yield* _(store.recordLike(UserId(1), UserId(3)))
      expect(yield* _(candidateIds(store, 1))).toEqual([2, 4])
      expect(yield* _(candidateIds(store, 1, [2]))).toEqual([4])
    }))

  it.effect("reset removes the user's own likes and keeps likes received", () =>
    Effect.gen(function*(_) {
      const { ref, store } = yield* _(seeded([1, 2, 3]))
      yield* _(store.recordLike(UserId(1), UserId(2)))
      yield* _(store.recordLike(UserId(3), UserId(1)))
      yield* _(store.resetUser(UserId(1)))
      expect(likePairs(yield* _(Ref.get(ref)))).toEqual(["3->1"])
      expect((yield* _(store.getProfile(UserId(1)))).status).toBe("draft")
      expect(yield* _(candidateIds(store, 3))).toEqual([2])
    }))

  it.effect("delete removes the profile and every like touching it", () =>
    Effect.gen(function*(_) {
      const { ref, store } = yield* _(seeded([1, 2, 3]))
      yield* _(store.recordLike(UserId(1), UserId(2)))
      yield* _(store.recordLike(UserId(3), UserId(1)))
      yield* _(store.recordLike(UserId(3), UserId(2)))
      yield* _(store.deleteUser(UserId(1)))
      expect(likePairs(yield* _(Ref.get(ref)))).toEqual(["3->2"])
      expect(yield* _(store.listActiveUserIds)).toEqual([2, 3])
    }))

  it.effect("removeLike is idempotent", () =>
    Effect.gen(function*(_) {
      const { ref, store } = yield* _(seeded([1, 2]))
      yield* _(store.recordLike(UserId(1), UserId(2)))
      yield* _(store.removeLike(UserId(1), UserId(2)))
      yield* _(store.removeLike(UserId(1), UserId(2)))
      expect(likePairs(yield* _(Ref.get(ref)))).toEqual([])
    }))
})
