import express from "express";
import type { ErrorRequestHandler, Request, RequestHandler, Response } from "express";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Journal } from "@bidmesh/journal";
import type { ErrorResponse } from "@bidmesh/schemas";
import { validateBidRequestData } from "@bidmesh/schemas";
import type { AuctionState } from "./auction-state.js";
import type { AuctionTimer } from "./auction-timer.js";
import { toBidResponse, toQueryResponse } from "./wire.js";

const MAX_BID_BODY = "16kb";

/** Structured error logging — omits stack traces in production. */
function logError(label: string, err: unknown): void {
  if (process.env.NODE_ENV === "production") {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`[replica] ${label}: ${msg}`);
  } else {
    console.error(`[replica] ${label}:`, err);
  }
}

function sendError(res: Response, status: number, error: string, details?: string[]): void {
  const body: ErrorResponse = details ? { error, details } : { error };
  res.status(status).json(body);
}

function methodNotAllowed(allowed: string): RequestHandler {
  return (_req, res) => {
    res.setHeader("Allow", allowed);
    sendError(res, 405, "Invalid method");
  };
}

/** Errors raised by body-parser carry an HTTP status and a `type`. */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export interface ReplicaServerConfig {
  auction: AuctionState;
  /** Closing timer for `auction`; disposed on shutdown. */
  timer?: AuctionTimer;
  journal: Journal;
}

/**
 * HTTP face of one replica: `POST /bid` and `GET /query`. Holds no auction
 * data itself; every request goes through the {@link AuctionState} it owns.
 */
export class ReplicaServer {
  private app: express.Application;
  private auction: AuctionState;
  private timer?: AuctionTimer;
  private journal: Journal;
  private httpServer?: Server;

  constructor(config: ReplicaServerConfig) {
    this.auction = config.auction;
    this.timer = config.timer;
    this.journal = config.journal;

    this.app = express();
    this.app.disable("x-powered-by");
    this.app.use((_req, res, next) => {
      res.setHeader("X-Content-Type-Options", "nosniff");
      res.setHeader("Cache-Control", "no-store");
      next();
    });

    this.app.route("/bid")
      // Parse as JSON whatever the Content-Type; the schema decides.
      .post(express.json({ limit: MAX_BID_BODY, type: () => true }), this.handleBid)
      .all(methodNotAllowed("POST"));
    this.app.route("/query")
      .get(this.handleQuery)
      .all(methodNotAllowed("GET, HEAD"));

    this.app.use((_req, res) => { sendError(res, 404, "Not found"); });
    this.app.use(this.handleError);
  }

  listen(port: number, host?: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const server = host === undefined ? this.app.listen(port) : this.app.listen(port, host);
      this.httpServer = server;
      server.once("error", reject);
      server.once("listening", () => {
        server.off("error", reject);
        const addr = server.address();
        if (addr === null || typeof addr === "string") {
          reject(new Error(`Unexpected listen address: ${String(addr)}`));
          return;
        }
        void this.journal.tryEmit("replica.started", {
          port: addr.port,
          duration_ms: this.auction.getDurationMs(),
        });
        resolve(addr);
      });
    });
  }

  async shutdown(): Promise<void> {
    this.timer?.dispose();
    const server = this.httpServer;
    if (server) {
      this.httpServer = undefined;
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
    await this.journal.tryEmit("replica.stopped", {});
    await this.journal.close();
  }

  private handleBid = async (req: Request, res: Response): Promise<void> => {
    try {
      const parsed = validateBidRequestData(req.body);
      if (!parsed.valid) {
        await this.journal.tryEmit("bid.invalid", { errors: parsed.errors });
        sendError(res, 400, "Invalid name or amount", parsed.errors);
        return;
      }
      const { name } = parsed.data;
      const amount = Math.trunc(parsed.data.amount);
      if (!Number.isSafeInteger(amount)) {
        await this.journal.tryEmit("bid.invalid", { name, errors: ["/amount: out of range"] });
        sendError(res, 400, "Invalid name or amount", ["/amount: out of range"]);
        return;
      }

      const outcome = await this.auction.placeBid(name, amount);
      switch (outcome.kind) {
        case "success":
          await this.journal.tryEmit("bid.accepted", { name, amount });
          break;
        case "rejected":
          await this.journal.tryEmit("bid.rejected", { name, amount, highest_bid: outcome.highestBid });
          break;
        case "auction_ended":
          await this.journal.tryEmit("bid.after_close", { name, amount });
          break;
      }
      res.status(200).json(toBidResponse(outcome));
    } catch (err) {
      logError("POST /bid", err);
      sendError(res, 500, "Internal server error");
    }
  };

  private handleQuery = async (_req: Request, res: Response): Promise<void> => {
    try {
      const snapshot = await this.auction.getStatus();
      await this.journal.tryEmit("query.served", {
        status: snapshot.status,
        highest_bid: snapshot.highestBid,
        highest_bidder: snapshot.highestBidder,
      });
      res.status(200).json(toQueryResponse(snapshot));
    } catch (err) {
      logError("GET /query", err);
      sendError(res, 500, "Internal server error");
    }
  };

  private handleError: ErrorRequestHandler = (err, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== null) {
      const message = err instanceof Error ? err.message : String(err);
      void this.journal.tryEmit("bid.invalid", { errors: [message] });
      sendError(res, status, status === 400 ? "Invalid request" : message);
      return;
    }
    logError("unhandled", err);
    sendError(res, 500, "Internal server error");
  };
}
