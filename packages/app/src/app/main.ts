import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, pipe } from "effect"

import { program } from "./program.js"

// CHANGE: run the bot through the Node platform runtime with its layer
// WHY: runMain gives signal handling, so SIGINT closes the database pool through the scope
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError | ProfileStoreError, never>
// INVARIANT: program executed with NodeContext.layer
const main = pipe(program, Effect.provide(NodeContext.layer))

NodeRuntime.runMain(main)
