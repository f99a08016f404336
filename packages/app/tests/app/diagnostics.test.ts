import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { formatError, logAndFallback } from "../../src/app/diagnostics.js"
import { ProfileStoreError } from "../../src/shell/profile-store.js"
import { TelegramApiError } from "../../src/shell/telegram.js"

describe("formatError", () => {
  it("renders plain errors and strings", () => {
    expect(formatError(new Error("boom"))).toBe("Error: boom")
    expect(formatError("plain")).toBe("plain")
  })

  it("renders tagged errors with their message", () => {
    expect(formatError(new ProfileStoreError({ message: "connection refused" })))
      .toBe("ProfileStoreError: connection refused")
  })

  it("adds code and method when a tagged error has them", () => {
    const error = new TelegramApiError({ description: "Forbidden", errorCode: 403, method: "sendMessage" })
    expect(formatError(error))
      .toBe("TelegramApiError: Forbidden code=403 method=sendMessage")
  })
})

describe("logAndFallback", () => {
  it.effect("replaces a failure with the fallback value", () =>
    Effect.gen(function*(_) {
      const value = yield* _(logAndFallback(Effect.fail(new ProfileStoreError({ message: "down" })), 7))
      expect(value).toBe(7)
    }))

  it.effect("keeps a success untouched", () =>
    Effect.gen(function*(_) {
      const value = yield* _(logAndFallback(Effect.succeed(3), 7))
      expect(value).toBe(3)
    }))
})
