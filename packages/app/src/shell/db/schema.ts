import { sql } from "drizzle-orm"
import { bigint, check, index, integer, pgEnum, pgTable, primaryKey, text, timestamp } from "drizzle-orm/pg-core"

export const profileStatusEnum = pgEnum("profile_status", ["draft", "active", "hidden"])

export const genderEnum = pgEnum("gender", ["male", "female"])

export const profilesTable = pgTable(
  "profiles",
  {
    userId: bigint("user_id", { mode: "number" }).notNull().primaryKey(),
    username: text("username"),
    name: text("name"),
    age: integer("age"),
    bio: text("bio"),
    photoRef: text("photo_ref"),
    gender: genderEnum("gender"),
    lookingFor: genderEnum("looking_for"),
    status: profileStatusEnum("status").notNull().default("draft"),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow()
  },
  (table) => [
    index("profiles_status_user_id_idx").on(table.status, table.userId)
  ]
)

export const likesTable = pgTable(
  "likes",
  {
    likerId: bigint("liker_id", { mode: "number" })
      .notNull()
      .references(() => profilesTable.userId, { onDelete: "cascade" }),
    likeeId: bigint("likee_id", { mode: "number" })
      .notNull()
      .references(() => profilesTable.userId, { onDelete: "cascade" }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow()
  },
  (table) => [
    primaryKey({ columns: [table.likerId, table.likeeId] }),
    index("likes_likee_id_idx").on(table.likeeId),
    check("likes_no_self_like", sql`${table.likerId} <> ${table.likeeId}`)
  ]
)

export type ProfileRow = typeof profilesTable.$inferSelect
export type LikeRow = typeof likesTable.$inferSelect
