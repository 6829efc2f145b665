import { Command } from "commander";
import {
  DEFAULT_AUCTION_DURATION_S,
  DEFAULT_BID_TIMEOUT_MS,
  DEFAULT_QUERY_TIMEOUT_MS,
  DEFAULT_REPLICA_PORT,
  DEFAULT_REPLICAS,
  resolveCoordinatorConfig,
  resolveReplicaConfig,
} from "./config.js";
import type { CoordinatorCliConfig, ReplicaCliConfig } from "./config.js";

export interface ProgramHandlers {
  replica: (config: ReplicaCliConfig) => Promise<unknown>;
  coordinator: (config: CoordinatorCliConfig) => Promise<void>;
}

export function createProgram(handlers: ProgramHandlers, env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();
  program.name("bidmesh").description("Replicated auction: independent replicas and a broadcasting coordinator").version("0.1.0");

  program.command("replica").description("Run one auction replica")
    .option("-p, --port <port>", "Port to listen on", env.BIDMESH_PORT ?? String(DEFAULT_REPLICA_PORT))
    .option("-d, --duration <seconds>", "Auction duration in seconds", env.BIDMESH_AUCTION_DURATION ?? String(DEFAULT_AUCTION_DURATION_S))
    .option("--log <path>", "Operational log file", env.BIDMESH_REPLICA_LOG ?? "auction.log")
    .action(async (opts: { port: string; duration: string; log: string }) => {
      await handlers.replica(resolveReplicaConfig(opts));
    });

  program.command("coordinator").description("Run the interactive coordinator console")
    .option("-r, --replicas <urls>", "Comma-separated replica base URLs, in query order", env.BIDMESH_REPLICAS ?? DEFAULT_REPLICAS.join(","))
    .option("--query-timeout <ms>", "Per-replica query timeout", env.BIDMESH_QUERY_TIMEOUT_MS ?? String(DEFAULT_QUERY_TIMEOUT_MS))
    .option("--bid-timeout <ms>", "Per-replica bid timeout", env.BIDMESH_BID_TIMEOUT_MS ?? String(DEFAULT_BID_TIMEOUT_MS))
    .option("--log <path>", "Operational log file", env.BIDMESH_COORDINATOR_LOG ?? "program.log")
    .action(async (opts: { replicas: string; queryTimeout: string; bidTimeout: string; log: string }) => {
      await handlers.coordinator(resolveCoordinatorConfig(opts));
    });

  return program;
}
