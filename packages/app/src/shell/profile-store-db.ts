import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { and, asc, eq, isNull, ne, notExists, notInArray, or, sql } from "drizzle-orm"
import { migrate } from "drizzle-orm/node-postgres/migrator"
import { Effect, pipe } from "effect"

import { UserId } from "../core/brand.js"
import type { Preferences, Profile } from "../core/domain.js"
import { type DrizzleTransaction, makeDbRunner, runInTransaction } from "./db-runner.js"
import { likesTable, profilesTable } from "./db/schema.js"
import { type DrizzleDatabase, DrizzleService } from "./drizzle.js"
import { ProfileNotFound, type ProfileStoreError, type ProfileStoreShape, toStoreError } from "./profile-store.js"
import { pairLockKey, toProfile, toProfileInsert } from "./profile-store-rows.js"

const onError = (error: Error | string): ProfileStoreError => toStoreError(error)

const runDb = makeDbRunner(onError)

const resolveMigrationsFolder = Effect.gen(function*(_) {
  const fs = yield* _(FileSystem.FileSystem)
  const path = yield* _(Path.Path)
  const cwd = process.cwd()
  const direct = path.resolve(cwd, "drizzle")
  const directMeta = path.join(direct, "meta", "_journal.json")
  const directExists = yield* _(fs.exists(directMeta))
  if (directExists) {
    return direct
  }

  const nested = path.resolve(cwd, "packages/app/drizzle")
  const nestedMeta = path.join(nested, "meta", "_journal.json")
  const nestedExists = yield* _(fs.exists(nestedMeta))
  if (nestedExists) {
    return nested
  }

  return direct
})

// CHANGE: build migration config with optional schema override
// WHY: allow running migrations without CREATE SCHEMA privileges
// FORMAT THEOREM: ∀f: cfg(f).migrationsFolder = f
// PURITY: SHELL
// INVARIANT: schema override is applied only when provided
// COMPLEXITY: O(1)/O(1)
const buildMigrationConfig = (
  migrationsFolder: string,
  migrationsSchema?: string
): Parameters<typeof migrate>[1] =>
  migrationsSchema
    ? { migrationsFolder, migrationsSchema }
    : { migrationsFolder }

export const runMigrations = (
  db: DrizzleDatabase,
  migrationsSchema?: string
): Effect.Effect<void, ProfileStoreError, FileSystem.FileSystem | Path.Path> =>
  pipe(
    resolveMigrationsFolder,
    Effect.mapError((error) => onError(error instanceof Error ? error : String(error))),
    Effect.flatMap((migrationsFolder) =>
      runDb(() => migrate(db, buildMigrationConfig(migrationsFolder, migrationsSchema)))
    ),
    Effect.asVoid
  )

const upsertProfile = (db: DrizzleDatabase): ProfileStoreShape["upsertProfile"] => (userId, patch) => {
  const insert = toProfileInsert(userId, patch)
  return pipe(
    runDb(() =>
      db
        .insert(profilesTable)
        .values(insert)
        .onConflictDoUpdate({
          target: profilesTable.userId,
          set: {
            username: insert.username,
            name: insert.name,
            age: insert.age,
            bio: insert.bio,
            photoRef: insert.photoRef,
            gender: insert.gender,
            lookingFor: insert.lookingFor,
            status: insert.status,
            updatedAt: new Date()
          }
        })
        .returning()
    ),
    Effect.flatMap((rows) => {
      const row = rows[0]
      return row ? toProfile(row, onError) : Effect.fail(onError(`Upsert returned no row for ${userId}`))
    })
  )
}

const getProfile = (db: DrizzleDatabase): ProfileStoreShape["getProfile"] => (userId) =>
  pipe(
    runDb(() => db.select().from(profilesTable).where(eq(profilesTable.userId, userId)).limit(1)),
    Effect.flatMap((rows): Effect.Effect<Profile, ProfileStoreError | ProfileNotFound> => {
      const row = rows[0]
      return row ? toProfile(row, onError) : Effect.fail(new ProfileNotFound({ userId }))
    })
  )

// CHANGE: insert a like and check the reverse like atomically
// WHY: two users liking each other at the same moment must see exactly one match
// FORMAT THEOREM: ∀a,b concurrent: |{call | recorded ∧ mutual}| = 1
// PURITY: SHELL
// EFFECT: Effect<RecordLikeResult, ProfileStoreError>
// INVARIANT: the transaction-scoped advisory lock on the unordered pair serializes A->B and B->A
// INVARIANT: the likee row is share-locked, so a reset or delete cannot slip in before the insert
// COMPLEXITY: O(log n)/O(1)
const recordLike = (db: DrizzleDatabase): ProfileStoreShape["recordLike"] => (likerId, likeeId) =>
  runInTransaction(db, onError, (tx: DrizzleTransaction) =>
    Effect.gen(function*(_) {
      const lockKey = pairLockKey(likerId, likeeId)
      yield* _(runDb(() => tx.execute(sql`select pg_advisory_xact_lock(hashtextextended(${lockKey}, 0))`)))
      const likee = yield* _(
        runDb(() =>
          tx
            .select({ status: profilesTable.status })
            .from(profilesTable)
            .where(eq(profilesTable.userId, likeeId))
            .for("share")
        )
      )
      if (likee[0]?.status !== "active") {
        return { status: "unavailable" } as const
      }
      const inserted = yield* _(
        runDb(() =>
          tx
            .insert(likesTable)
            .values({ likerId, likeeId })
            .onConflictDoNothing()
            .returning({ likerId: likesTable.likerId })
        )
      )
      const reverse = yield* _(
        runDb(() =>
          tx
            .select({ likerId: likesTable.likerId })
            .from(likesTable)
            .where(and(eq(likesTable.likerId, likeeId), eq(likesTable.likeeId, likerId)))
            .limit(1)
        )
      )
      return {
        status: inserted.length > 0 ? "recorded" : "alreadyLiked",
        mutual: reverse.length > 0
      } as const
    }))

const removeLike = (db: DrizzleDatabase): ProfileStoreShape["removeLike"] => (likerId, likeeId) =>
  pipe(
    runDb(() =>
      db
        .delete(likesTable)
        .where(and(eq(likesTable.likerId, likerId), eq(likesTable.likeeId, likeeId)))
    ),
    Effect.asVoid
  )

const noPreferences: Preferences = { gender: null, lookingFor: null }

const viewerPreferences = (db: DrizzleDatabase, userId: number): Effect.Effect<Preferences, ProfileStoreError> =>
  pipe(
    runDb(() =>
      db
        .select({ gender: profilesTable.gender, lookingFor: profilesTable.lookingFor })
        .from(profilesTable)
        .where(eq(profilesTable.userId, userId))
        .limit(1)
    ),
    Effect.map((rows) => rows[0] ?? noPreferences)
  )

// CHANGE: pick the lowest-id candidate the viewer has not seen or liked
// WHY: both sides' gender wishes must allow the pair, as in the domain rule
// FORMAT THEOREM: ∀v,c: next(v) = c -> preferencesMatch(v, c)
// PURITY: SHELL
// EFFECT: Effect<Profile | null, ProfileStoreError>
// INVARIANT: a null gender or a null wish matches everybody
// COMPLEXITY: O(log n)/O(1)
const nextCandidate = (db: DrizzleDatabase): ProfileStoreShape["nextCandidate"] => (userId, excludeIds) =>
  pipe(
    viewerPreferences(db, userId),
    Effect.flatMap((viewer) =>
      runDb(() =>
        db
          .select()
          .from(profilesTable)
          .where(
            and(
              eq(profilesTable.status, "active"),
              ne(profilesTable.userId, userId),
              excludeIds.length > 0 ? notInArray(profilesTable.userId, [...excludeIds]) : undefined,
              viewer.lookingFor === null
                ? undefined
                : or(isNull(profilesTable.gender), eq(profilesTable.gender, viewer.lookingFor)),
              viewer.gender === null
                ? undefined
                : or(isNull(profilesTable.lookingFor), eq(profilesTable.lookingFor, viewer.gender)),
              notExists(
                db
                  .select({ likeeId: likesTable.likeeId })
                  .from(likesTable)
                  .where(and(eq(likesTable.likerId, userId), eq(likesTable.likeeId, profilesTable.userId)))
              )
            )
          )
          .orderBy(asc(profilesTable.userId))
          .limit(1)
      )
    ),
    Effect.flatMap((rows): Effect.Effect<Profile | null, ProfileStoreError> => {
      const row = rows[0]
      return row ? toProfile(row, onError) : Effect.succeed(null)
    })
  )

const resetUser = (db: DrizzleDatabase): ProfileStoreShape["resetUser"] => (userId) =>
  runInTransaction(db, onError, (tx: DrizzleTransaction) =>
    pipe(
      runDb(() => tx.delete(likesTable).where(eq(likesTable.likerId, userId))),
      Effect.zipRight(
        runDb(() =>
          tx
            .update(profilesTable)
            .set({ status: "draft", updatedAt: new Date() })
            .where(eq(profilesTable.userId, userId))
        )
      ),
      Effect.asVoid
    ))

const deleteUser = (db: DrizzleDatabase): ProfileStoreShape["deleteUser"] => (userId) =>
  runInTransaction(db, onError, (tx: DrizzleTransaction) =>
    pipe(
      runDb(() =>
        tx
          .delete(likesTable)
          .where(or(eq(likesTable.likerId, userId), eq(likesTable.likeeId, userId)))
      ),
      Effect.zipRight(runDb(() => tx.delete(profilesTable).where(eq(profilesTable.userId, userId)))),
      Effect.asVoid
    ))

const listActiveUserIds = (db: DrizzleDatabase): ProfileStoreShape["listActiveUserIds"] =>
  pipe(
    runDb(() =>
      db
        .select({ userId: profilesTable.userId })
        .from(profilesTable)
        .where(eq(profilesTable.status, "active"))
        .orderBy(asc(profilesTable.userId))
    ),
    Effect.map((rows) => rows.map((row) => UserId(row.userId)))
  )

// CHANGE: back the profile store with PostgreSQL through drizzle
// WHY: profiles and likes must survive restarts and be shared by every dialogue
// FORMAT THEOREM: ∀op: op(db) is one statement or one transaction
// PURITY: SHELL
// EFFECT: Effect<ProfileStoreShape, ProfileStoreError, FileSystem | Path>
// INVARIANT: migrations are applied before the first query
// COMPLEXITY: O(1)/O(1)
export const makeDbProfileStore = (
  migrationsSchema?: string
): Effect.Effect<
  ProfileStoreShape,
  ProfileStoreError,
  DrizzleService | FileSystem.FileSystem | Path.Path
> =>
  Effect.gen(function*(_) {
    const { db } = yield* _(DrizzleService)
    yield* _(runMigrations(db, migrationsSchema))
    return {
      upsertProfile: upsertProfile(db),
      getProfile: getProfile(db),
      recordLike: recordLike(db),
      removeLike: removeLike(db),
      nextCandidate: nextCandidate(db),
      resetUser: resetUser(db),
      deleteUser: deleteUser(db),
      listActiveUserIds: listActiveUserIds(db)
    }
  })
