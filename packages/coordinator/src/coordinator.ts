import type { Journal } from "@bidmesh/journal";
import type { BidRequest, QueryResponse } from "@bidmesh/schemas";
import { ReplicaTransport } from "./transport.js";

export interface CoordinatorOptions {
  query_timeout_ms: number;
  bid_timeout_ms: number;
}

export const DEFAULT_COORDINATOR_OPTIONS: CoordinatorOptions = {
  query_timeout_ms: 2000,
  bid_timeout_ms: 10000,
};

export interface ReplicaAttempt {
  replica: string;
  status: number;
  error: string;
}

export interface QueryResult {
  replica: string;
  data: QueryResponse;
  latency_ms: number;
}

/** Every replica failed a query; carries each attempt in the order tried. */
export class QueryFailedError extends Error {
  readonly attempts: readonly ReplicaAttempt[];

  constructor(attempts: ReplicaAttempt[]) {
    super(`All ${attempts.length} replica(s) failed to answer the query`);
    this.name = "QueryFailedError";
    this.attempts = attempts;
  }
}

/**
 * Client side of the replicated auction. Bids go to every replica with no
 * agreement step; queries take the first replica, in configured order, that
 * answers. Replicas may therefore disagree and nothing here reconciles them.
 */
export class Coordinator {
  private readonly replicas: readonly string[];
  private readonly journal: Journal;
  private readonly transport: ReplicaTransport;
  private readonly options: CoordinatorOptions;

  constructor(params: {
    replicas: string[];
    journal: Journal;
    transport?: ReplicaTransport;
    options?: Partial<CoordinatorOptions>;
  }) {
    if (params.replicas.length === 0) {
      throw new Error("Coordinator needs at least one replica address");
    }
    for (const replica of params.replicas) {
      const parsed = new URL(replica);
      if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
        throw new Error(`Replica address must be http(s): "${replica}"`);
      }
    }
    this.replicas = Object.freeze([...params.replicas]);
    this.journal = params.journal;
    this.transport = params.transport ?? new ReplicaTransport();
    this.options = { ...DEFAULT_COORDINATOR_OPTIONS, ...params.options };
  }

  getReplicas(): readonly string[] {
    return this.replicas;
  }

  /**
   * Broadcast a bid to every replica. Each replica's outcome, or the reason it
   * could not be reached, goes to the log; nothing is returned.
   */
  async bid(name: string, amount: number): Promise<void> {
    if (!Number.isSafeInteger(amount)) {
      throw new RangeError(`Bid amount must be an integer, got ${amount}`);
    }
    const request: BidRequest = { name, amount };
    await this.journal.tryEmit("coordinator.bid_requested", { name, amount, replicas: this.replicas.length });
    await Promise.allSettled(this.replicas.map((replica) => this.bidOne(replica, request)));
    await this.journal.tryEmit("coordinator.bid_completed", { name, amount });
  }

  /**
   * Ask replicas one at a time, in configured order, and return the first
   * readable answer unchanged. Throws {@link QueryFailedError} if none answers.
   */
  async query(): Promise<QueryResult> {
    await this.journal.tryEmit("coordinator.query_requested", { replicas: this.replicas.length });
    const attempts: ReplicaAttempt[] = [];

    for (const replica of this.replicas) {
      const res = await this.transport.fetchStatus(replica, this.options.query_timeout_ms);
      if (res.ok && res.data) {
        await this.journal.tryEmit("coordinator.query_succeeded", {
          replica,
          latency_ms: res.latency_ms,
          data: { ...res.data },
        });
        return { replica, data: res.data, latency_ms: res.latency_ms };
      }
      const attempt = { replica, status: res.status, error: res.error ?? "unknown error" };
      attempts.push(attempt);
      await this.journal.tryEmit("coordinator.query_replica_failed", { ...attempt });
    }

    await this.journal.tryEmit("coordinator.query_failed", { attempts: attempts.map((a) => ({ ...a })) });
    throw new QueryFailedError(attempts);
  }

  private async bidOne(replica: string, request: BidRequest): Promise<void> {
    const res = await this.transport.sendBid(replica, request, this.options.bid_timeout_ms);
    if (!res.ok || !res.data) {
      await this.journal.tryEmit("coordinator.bid_replica_failed", {
        replica,
        status: res.status,
        error: res.error ?? "unknown error",
      });
      return;
    }
    await this.journal.tryEmit("coordinator.bid_replica_outcome", {
      replica,
      latency_ms: res.latency_ms,
      ...res.data,
    });
  }
}
