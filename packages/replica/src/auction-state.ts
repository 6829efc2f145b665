import type { AuctionSnapshot, AuctionStatus, BidOutcome } from "@bidmesh/schemas";
import { ReadWriteLock } from "./rw-lock.js";

export const BID_TOO_LOW_REASON = "bid must be higher than current highest bid";

export interface AuctionStateOptions {
  durationMs: number;
  /** Clock in epoch milliseconds. Default: Date.now */
  now?: () => number;
}

/**
 * One replica's auction. Bids and closing take the lock exclusively; status
 * reads share it. The only transition is ongoing -> ended, and it happens once.
 */
export class AuctionState {
  private highestBid = 0;
  private highestBidder = "";
  private bidders = new Map<string, number>();
  private status: AuctionStatus = "ongoing";
  private readonly startTime: number;
  private readonly durationMs: number;
  private readonly now: () => number;
  private readonly lock = new ReadWriteLock();

  constructor(options: AuctionStateOptions) {
    if (!Number.isFinite(options.durationMs) || options.durationMs < 0) {
      throw new RangeError(`durationMs must be a non-negative number, got ${options.durationMs}`);
    }
    this.durationMs = options.durationMs;
    this.now = options.now ?? Date.now;
    this.startTime = this.now();
  }

  /**
   * Accept the bid only if it is strictly above the current highest bid.
   * Rejected and post-close bids leave every field untouched.
   */
  async placeBid(bidderId: string, amount: number): Promise<BidOutcome> {
    if (!Number.isSafeInteger(amount)) {
      throw new TypeError(`Bid amount must be a safe integer, got ${amount}`);
    }
    return this.lock.withWrite((): BidOutcome => {
      if (this.status === "ended") {
        return { kind: "auction_ended" };
      }
      if (amount <= this.highestBid) {
        return { kind: "rejected", reason: BID_TOO_LOW_REASON, highestBid: this.highestBid };
      }
      this.highestBid = amount;
      this.highestBidder = bidderId;
      this.bidders.set(bidderId, amount);
      return { kind: "success" };
    });
  }

  async getStatus(): Promise<AuctionSnapshot> {
    return this.lock.withRead(() => this.snapshot());
  }

  /** Returns true only for the call that performed the transition. */
  async closeIfExpired(): Promise<boolean> {
    return this.lock.withWrite(() => {
      if (this.status === "ended") return false;
      this.status = "ended";
      return true;
    });
  }

  /** Last accepted amount per bidder. */
  async getBidders(): Promise<ReadonlyMap<string, number>> {
    return this.lock.withRead(() => new Map(this.bidders));
  }

  getDurationMs(): number {
    return this.durationMs;
  }

  getStartTime(): number {
    return this.startTime;
  }

  private snapshot(): AuctionSnapshot {
    const elapsedSeconds = Math.trunc((this.now() - this.startTime) / 1000);
    const snapshot: AuctionSnapshot = {
      status: this.status,
      highestBid: this.highestBid,
      highestBidder: this.highestBidder,
      timeRemaining: Math.trunc(this.durationMs / 1000) - elapsedSeconds,
    };
    if (this.status === "ended") {
      snapshot.winner = this.highestBidder;
    }
    return snapshot;
  }
}
