import type { PhotoRef } from "./brand.js"
import type { Choice } from "./menu.js"
import { parseChoice } from "./menu.js"

export type Command = "start" | "reset" | "cancel" | "help" | "profile" | "browse" | "broadcast"

export type ConversationInput =
  | { readonly kind: "command"; readonly command: Command; readonly argument: string }
  | { readonly kind: "choice"; readonly choice: Choice }
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "photo"; readonly ref: PhotoRef }
  | { readonly kind: "unsupported" }

const commandAliases: Readonly<Record<string, Command>> = {
  "/start": "start",
  "/reset": "reset",
  "/cancel": "cancel",
  "/help": "help",
  "/myprofile": "profile",
  "/profile": "profile",
  "/browse": "browse",
  "/broadcast": "broadcast",
  "/allmessage": "broadcast"
}

const normalizeUsername = (value: string): string => value.replace(/^@/, "").toLowerCase()

// CHANGE: normalize telegram command tokens
// WHY: ignore bot username suffix and trailing arguments
// FORMAT THEOREM: forall s: normalize(s) = head(tokenize(s)) without @suffix
// PURITY: CORE
// INVARIANT: output contains no whitespace and is lower case
// COMPLEXITY: O(n)/O(n)
export const normalizeCommand = (text: string): string => {
  const token = text.trim().split(/\s+/)[0] ?? ""
  return (token.split("@")[0] ?? "").toLowerCase()
}

const commandTarget = (text: string): string | undefined => {
  const token = text.trim().split(/\s+/)[0] ?? ""
  const target = token.split("@")[1]
  return target ? normalizeUsername(target) : undefined
}

const commandArgument = (text: string): string => {
  const trimmed = text.trim()
  const boundary = trimmed.search(/\s/)
  return boundary === -1 ? "" : trimmed.slice(boundary).trim()
}

const parseCommand = (text: string, botUsername?: string): ConversationInput => {
  const target = commandTarget(text)
  if (target && botUsername && normalizeUsername(botUsername) !== target) {
    return { kind: "unsupported" }
  }
  const command = commandAliases[normalizeCommand(text)]
  return command
    ? { kind: "command", command, argument: commandArgument(text) }
    : { kind: "unsupported" }
}

// CHANGE: classify a raw message into a closed set of dialogue inputs
// WHY: every state matches inputs explicitly instead of dispatching on free text
// FORMAT THEOREM: ∀m: parse(m).kind ∈ {command, choice, text, photo, unsupported}
// PURITY: CORE
// INVARIANT: photos win over captions; menu labels win over free text
// COMPLEXITY: O(n)/O(n)
export const parseInput = (
  message: { readonly text?: string | undefined; readonly photoRef?: PhotoRef | undefined },
  botUsername?: string
): ConversationInput => {
  if (message.photoRef !== undefined) {
    return { kind: "photo", ref: message.photoRef }
  }
  const text = message.text
  if (text === undefined || text.trim().length === 0) {
    return { kind: "unsupported" }
  }
  if (text.trim().startsWith("/")) {
    return parseCommand(text, botUsername)
  }
  const choice = parseChoice(text)
  return choice ? { kind: "choice", choice } : { kind: "text", text }
}
