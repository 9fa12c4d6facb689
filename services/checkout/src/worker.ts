import { NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { main } from "./main.js"
import { WorkerLive } from "./layers.js"
import { makeTelemetryLive } from "./telemetry.js"

const program = main.pipe(
  Effect.provide(WorkerLive),
  Effect.provide(makeTelemetryLive("payment-callback-worker"))
)

NodeRuntime.runMain(program)
