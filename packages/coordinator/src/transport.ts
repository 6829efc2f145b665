import type { BidRequest, BidResponse, QueryResponse, ValidationResult } from "@bidmesh/schemas";
import { validateBidResponseData, validateQueryResponseData } from "@bidmesh/schemas";

export interface TransportResponse<T = unknown> {
  ok: boolean;
  status: number;
  data?: T;
  error?: string;
  latency_ms: number;
}

export interface ReplicaTransportConfig {
  /** Default per-request bound. Default: 10000 */
  timeout_ms?: number;
}

type Decoder<T> = (data: unknown) => ValidationResult<T>;

/**
 * HTTP client for single replica interactions. Never throws: connection
 * failures, timeouts, non-2xx statuses and undecodable bodies all come back
 * as `ok: false`.
 */
export class ReplicaTransport {
  private timeoutMs: number;

  constructor(config: ReplicaTransportConfig = {}) {
    this.timeoutMs = config.timeout_ms ?? 10000;
  }

  async sendBid(replicaUrl: string, bid: BidRequest, timeoutMs?: number): Promise<TransportResponse<BidResponse>> {
    return this.send(replicaUrl, "/bid", "POST", validateBidResponseData, bid, timeoutMs);
  }

  async fetchStatus(replicaUrl: string, timeoutMs?: number): Promise<TransportResponse<QueryResponse>> {
    return this.send(replicaUrl, "/query", "GET", validateQueryResponseData, undefined, timeoutMs);
  }

  private async send<T>(
    baseUrl: string,
    path: string,
    method: string,
    decode: Decoder<T>,
    body?: unknown,
    timeoutMs = this.timeoutMs,
  ): Promise<TransportResponse<T>> {
    const url = `${baseUrl.replace(/\/$/, "")}${path}`;
    const start = Date.now();
    const headers: Record<string, string> = { Accept: "application/json" };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetch(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });

      if (!response.ok) {
        let errorText: string;
        try {
          const errBody = await response.json() as Record<string, unknown>;
          errorText = typeof errBody.error === "string" ? errBody.error : response.statusText;
        } catch {
          errorText = response.statusText;
        }
        return { ok: false, status: response.status, error: `HTTP ${response.status}: ${errorText}`, latency_ms: Date.now() - start };
      }

      let raw: unknown;
      try {
        raw = await response.json();
      } catch (err) {
        if (isAbortError(err)) throw err;
        const message = err instanceof Error ? err.message : String(err);
        return { ok: false, status: response.status, error: `Unreadable response body: ${message}`, latency_ms: Date.now() - start };
      }

      const decoded = decode(raw);
      const latency_ms = Date.now() - start;
      if (!decoded.valid) {
        return { ok: false, status: response.status, error: `Unexpected response shape: ${decoded.errors.join(", ")}`, latency_ms };
      }
      return { ok: true, status: response.status, data: decoded.data, latency_ms };
    } catch (err) {
      const latency_ms = Date.now() - start;
      const abort = isAbortError(err);
      return {
        ok: false,
        status: abort ? 408 : 0,
        error: abort ? `Request timed out after ${timeoutMs}ms` : describeFetchError(err),
        latency_ms,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/** fetch() wraps socket errors as "fetch failed"; surface the cause. */
function describeFetchError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause;
  if (cause instanceof Error && cause.message) {
    return `${err.message}: ${cause.message}`;
  }
  return err.message;
}
