import { resolve } from "node:path";

export const DEFAULT_REPLICA_PORT = 8080;
export const DEFAULT_AUCTION_DURATION_S = 100;
export const DEFAULT_REPLICAS = ["http://localhost:8080", "http://localhost:8081"];
export const DEFAULT_QUERY_TIMEOUT_MS = 2000;
export const DEFAULT_BID_TIMEOUT_MS = 10000;

export interface ReplicaCliConfig {
  port: number;
  durationMs: number;
  logPath: string;
}

export interface CoordinatorCliConfig {
  replicas: string[];
  queryTimeoutMs: number;
  bidTimeoutMs: number;
  logPath: string;
}

const DIGITS_RE = /^\d+$/;

export function parsePort(value: string, label = "port"): number {
  const port = DIGITS_RE.test(value.trim()) ? parseInt(value, 10) : NaN;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid ${label}: "${value}" (must be 0–65535)`);
  }
  return port;
}

export function parsePositiveInt(value: string, label: string): number {
  const n = DIGITS_RE.test(value.trim()) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new Error(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

/** Comma-separated http(s) base URLs, order preserved. */
export function parseReplicaList(value: string): string[] {
  const urls = value.split(",").map((s) => s.trim()).filter(Boolean);
  if (urls.length === 0) {
    throw new Error("Invalid replicas: at least one replica URL is required");
  }
  for (const url of urls) {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new Error(`Invalid replica URL: "${url}"`);
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new Error(`Invalid replica URL: "${url}" (must be http or https)`);
    }
  }
  return urls;
}

export function resolveReplicaConfig(opts: { port: string; duration: string; log: string }): ReplicaCliConfig {
  const durationMs = parsePositiveInt(opts.duration, "duration") * 1000;
  if (!Number.isSafeInteger(durationMs)) {
    throw new Error(`Invalid duration: "${opts.duration}" (too large)`);
  }
  return {
    port: parsePort(opts.port),
    durationMs,
    logPath: resolve(opts.log),
  };
}

export function resolveCoordinatorConfig(opts: {
  replicas: string;
  queryTimeout: string;
  bidTimeout: string;
  log: string;
}): CoordinatorCliConfig {
  return {
    replicas: parseReplicaList(opts.replicas),
    queryTimeoutMs: parsePositiveInt(opts.queryTimeout, "query timeout"),
    bidTimeoutMs: parsePositiveInt(opts.bidTimeout, "bid timeout"),
    logPath: resolve(opts.log),
  };
}
