import "dotenv/config"
import { defineConfig } from "drizzle-kit"

// Used by `npm run db:generate` to write new files under ./drizzle from the schema.
export default defineConfig({
  dialect: "postgresql",
  schema: "./src/shell/db/schema.ts",
  out: "./drizzle",
  strict: true,
  verbose: true,
  dbCredentials: {
    url: process.env.BOT_DATABASE_URL ?? "postgres://localhost:5432/match_bot"
  }
})
