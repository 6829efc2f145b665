#!/usr/bin/env node
import "dotenv/config";
import { createProgram } from "./program.js";
import { runCoordinator, runReplica } from "./runners.js";

process.on("unhandledRejection", (reason) => {
  console.error("[bidmesh] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[bidmesh] Uncaught exception:", err);
  process.exit(1);
});

const program = createProgram({
  replica: (config) => runReplica(config),
  coordinator: (config) => runCoordinator(config),
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`[bidmesh] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
