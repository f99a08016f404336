import type { Gender } from "./domain.js"

export type Choice =
  | "start"
  | "browse"
  | "like"
  | "pass"
  | "undo"
  | "menu"
  | "myProfile"
  | "editProfile"
  | "deleteProfile"
  | "support"
  | "confirm"
  | "edit"
  | "keep"
  | "cancel"
  | "iAmMale"
  | "iAmFemale"
  | "seekMale"
  | "seekFemale"

export type MenuRows = ReadonlyArray<ReadonlyArray<Choice>>

// CHANGE: define the button labels for every menu choice
// WHY: the transport sends button presses back as their label text
// FORMAT THEOREM: ∀c1,c2: c1 != c2 -> label(c1) != label(c2)
// PURITY: CORE
// INVARIANT: labels are unique, so label -> choice is a function
// COMPLEXITY: O(1)/O(1)
export const choiceLabels: Readonly<Record<Choice, string>> = {
  start: "🚀 Start",
  browse: "🔎 Browse profiles",
  like: "❤️",
  pass: "👎",
  undo: "↩️ Undo like",
  menu: "⬅️ Menu",
  myProfile: "👤 My profile",
  editProfile: "✏️ Edit profile",
  deleteProfile: "🗑 Delete profile",
  support: "🆘 Support",
  confirm: "✅ Save profile",
  edit: "✏️ Change something",
  keep: "Keep current",
  cancel: "Cancel",
  iAmMale: "🙋‍♂️ I'm a guy",
  iAmFemale: "🙋‍♀️ I'm a girl",
  seekMale: "👨 A guy",
  seekFemale: "👩 A girl"
}

const isChoice = (value: string): value is Choice => Object.hasOwn(choiceLabels, value)

const labelIndex: ReadonlyMap<string, Choice> = new Map(
  Object.entries(choiceLabels).flatMap(([choice, label]) => isChoice(choice) ? [[label, choice] as const] : [])
)

export const parseChoice = (text: string): Choice | null => labelIndex.get(text.trim()) ?? null

export const mainMenu: MenuRows = [["browse"], ["myProfile", "editProfile"], ["support"]]

export const browseMenu = (canUndo: boolean): MenuRows =>
  canUndo ? [["like", "pass"], ["undo", "menu"]] : [["like", "pass"], ["menu"]]

export const promptMenu = (canKeep: boolean): MenuRows => canKeep ? [["keep"], ["cancel"]] : [["cancel"]]

export const genderMenu = (canKeep: boolean): MenuRows => [["iAmMale", "iAmFemale"], ...promptMenu(canKeep)]

export const lookingForMenu = (canKeep: boolean): MenuRows => [["seekMale", "seekFemale"], ...promptMenu(canKeep)]

const genderChoices: Readonly<Partial<Record<Choice, Gender>>> = { iAmMale: "male", iAmFemale: "female" }

const lookingForChoices: Readonly<Partial<Record<Choice, Gender>>> = { seekMale: "male", seekFemale: "female" }

export const genderOf = (choice: Choice): Gender | null => genderChoices[choice] ?? null

export const lookingForOf = (choice: Choice): Gender | null => lookingForChoices[choice] ?? null

export const confirmMenu: MenuRows = [["confirm"], ["edit"], ["cancel"]]

export const profileMenu: MenuRows = [["editProfile"], ["deleteProfile"], ["menu"]]

export const startMenu: MenuRows = [["start"]]

export const exhaustedMenu: MenuRows = [["browse"], ["menu"]]
