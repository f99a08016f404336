import type { PhotoRef, UserId } from "./brand.js"
import type { MenuRows } from "./menu.js"

export type OutgoingMessage = {
  readonly userId: UserId
  readonly text: string
  // null leaves the keyboard the user currently sees untouched
  readonly options: MenuRows | null
  readonly photoRef: PhotoRef | null
}

export const textReply = (userId: UserId, text: string, options: MenuRows | null = null): OutgoingMessage => ({
  userId,
  text,
  options,
  photoRef: null
})

export const photoReply = (
  userId: UserId,
  photoRef: PhotoRef,
  caption: string,
  options: MenuRows | null = null
): OutgoingMessage => ({
  userId,
  text: caption,
  options,
  photoRef
})
