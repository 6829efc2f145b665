import type { AddressInfo } from "node:net";
import type { Readable, Writable } from "node:stream";
import { Journal } from "@bidmesh/journal";
import { ReplicaServer, startAuction } from "@bidmesh/replica";
import { Coordinator, OperatorConsole, ReplicaTransport } from "@bidmesh/coordinator";
import type { CoordinatorCliConfig, ReplicaCliConfig } from "./config.js";

export interface RunningReplica {
  server: ReplicaServer;
  address: AddressInfo;
  stop: () => Promise<void>;
}

export async function runReplica(
  config: ReplicaCliConfig,
  options: { handleSignals?: boolean; journalLock?: boolean } = {},
): Promise<RunningReplica> {
  const journal = new Journal(config.logPath, {
    source: `replica:${config.port}`,
    lock: options.journalLock ?? true,
  });
  await journal.init();

  const { state, timer } = startAuction(config.durationMs, {
    onClose: async (snapshot) => {
      await journal.tryEmit("auction.closed", {
        winner: snapshot.winner ?? "",
        highest_bid: snapshot.highestBid,
      });
      console.log(`[bidmesh] Auction ended. Winner: ${snapshot.winner || "(none)"} with bid ${snapshot.highestBid}`);
    },
  });
  const server = new ReplicaServer({ auction: state, timer, journal });
  const address = await server.listen(config.port);
  console.log(`[bidmesh] Auction replica listening on http://localhost:${address.port} (closes in ${config.durationMs / 1000}s)`);

  let stopped = false;
  const stop = async () => {
    if (stopped) return;
    stopped = true;
    await server.shutdown();
  };
  if (options.handleSignals ?? true) {
    journal.registerShutdownHandler(stop);
  }
  return { server, address, stop };
}

export async function runCoordinator(
  config: CoordinatorCliConfig,
  io: { input: Readable; output: Writable } = { input: process.stdin, output: process.stdout },
  options: { journalLock?: boolean } = {},
): Promise<void> {
  const journal = new Journal(config.logPath, { source: "coordinator", lock: options.journalLock ?? true });
  await journal.init();
  try {
    await journal.tryEmit("coordinator.started", { replicas: config.replicas });
    const coordinator = new Coordinator({
      replicas: config.replicas,
      journal,
      transport: new ReplicaTransport({ timeout_ms: config.bidTimeoutMs }),
      options: { query_timeout_ms: config.queryTimeoutMs, bid_timeout_ms: config.bidTimeoutMs },
    });
    await new OperatorConsole({ coordinator, journal, ...io }).run();
  } finally {
    await journal.close();
  }
}
