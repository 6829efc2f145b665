/**
 * bidmesh wire and domain types.
 *
 * Field names on the wire types are fixed by the replica HTTP protocol and
 * shared by replicas, the coordinator and tests.
 */

// ─── Auction ────────────────────────────────────────────────────────

export type AuctionStatus = "ongoing" | "ended";

export type BidOutcome =
  | { kind: "success" }
  | { kind: "rejected"; reason: string; highestBid: number }
  | { kind: "auction_ended" };

export interface AuctionSnapshot {
  status: AuctionStatus;
  highestBid: number;
  highestBidder: string;
  /** Whole seconds left; negative once expired but not yet closed. */
  timeRemaining: number;
  winner?: string;
}

// ─── Wire: POST /bid ────────────────────────────────────────────────

export interface BidRequest {
  name: string;
  amount: number;
}

export type BidResponse =
  | { outcome: "success" }
  | { outcome: "fail"; reason: string }
  | { outcome: "auction ended" };

// ─── Wire: GET /query ───────────────────────────────────────────────

export interface QueryResponse {
  status: AuctionStatus;
  highest_bid: number;
  highest_bidder: string;
  time_remaining: number;
  winner?: string;
}

export interface ErrorResponse {
  error: string;
  details?: string[];
}

// ─── Operational log ────────────────────────────────────────────────

export type OpLogEventType =
  | "replica.started"
  | "replica.stopped"
  | "auction.closed"
  | "bid.accepted"
  | "bid.rejected"
  | "bid.after_close"
  | "bid.invalid"
  | "query.served"
  | "coordinator.started"
  | "coordinator.bid_requested"
  | "coordinator.bid_replica_outcome"
  | "coordinator.bid_replica_failed"
  | "coordinator.bid_completed"
  | "coordinator.query_requested"
  | "coordinator.query_replica_failed"
  | "coordinator.query_succeeded"
  | "coordinator.query_failed"
  | "console.exit";

export interface OpLogEvent {
  event_id: string;
  timestamp: string;
  /** Process label, e.g. "replica:8080" or "coordinator". */
  source: string;
  type: OpLogEventType;
  payload: Record<string, unknown>;
  seq?: number;
}
