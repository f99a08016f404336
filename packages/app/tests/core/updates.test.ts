import { describe, expect, it } from "@effect/vitest"
import fc from "fast-check"

import { PhotoRef, UserId } from "../../src/core/brand.js"
import { groupByUser, type IncomingUpdate, nextOffset, toUserEvents } from "../../src/core/updates.js"

const privateText = (updateId: number, userId: number, text: string, username?: string): IncomingUpdate => ({
  updateId,
  message: {
    chatType: "private",
    from: { id: UserId(userId), firstName: `User ${userId}`, username },
    text
  }
})

describe("updates", () => {
  it("advances the offset past the newest update", () => {
    expect(nextOffset(5, [privateText(7, 1, "a"), privateText(9, 2, "b")])).toBe(10)
    expect(nextOffset(5, [])).toBe(5)
  })

  it("never moves the offset backwards", () => {
    fc.assert(
      fc.property(
        fc.nat({ max: 1000 }),
        fc.array(fc.nat({ max: 1000 }), { maxLength: 20 }),
        (offset, ids) => {
          const updates = ids.map((id) => privateText(id, 1, "x"))
          expect(nextOffset(offset, updates)).toBeGreaterThanOrEqual(offset)
        }
      )
    )
  })

  it("keeps private messages only", () => {
    const group: IncomingUpdate = {
      updateId: 2,
      message: {
        chatType: "group",
        from: { id: UserId(3), firstName: "Group" },
        text: "/start"
      }
    }
    const events = toUserEvents([privateText(1, 3, "/start", "ann"), group, { updateId: 3 }])
    expect(events).toEqual([
      {
        updateId: 1,
        userId: 3,
        username: "ann",
        input: { kind: "command", command: "start", argument: "" }
      }
    ])
  })

  it("turns photo messages into photo inputs", () => {
    const update: IncomingUpdate = {
      updateId: 4,
      message: {
        chatType: "private",
        from: { id: UserId(8), firstName: "Photo" },
        photoRef: PhotoRef("file-large")
      }
    }
    expect(toUserEvents([update])[0]?.input).toEqual({ kind: "photo", ref: "file-large" })
  })

  it("groups events by user in arrival order", () => {
    const events = toUserEvents([
      privateText(1, 10, "first"),
      privateText(2, 20, "other"),
      privateText(3, 10, "second")
    ])
    const groups = groupByUser(events)
    expect(groups.map((group) => group.map((event) => event.updateId))).toEqual([[1, 3], [2]])
  })
})
