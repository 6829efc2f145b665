import type { AuctionSnapshot } from "@bidmesh/schemas";
import { AuctionState } from "./auction-state.js";

/** Largest delay setTimeout honours (2^31 - 1 ms). */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type AuctionTimerPhase = "idle" | "waiting" | "fired" | "disposed";

export interface AuctionTimerOptions {
  /** Called with the final snapshot when this timer closed the auction. */
  onClose?: (snapshot: AuctionSnapshot) => void | Promise<void>;
}

/**
 * One-shot closer for an {@link AuctionState}. Once started it waits the
 * state's full duration and closes it exactly once; nothing in the bid or
 * query path can stop it. `dispose()` exists only for process shutdown.
 */
export class AuctionTimer {
  private state: AuctionState;
  private onClose?: (snapshot: AuctionSnapshot) => void | Promise<void>;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private phase: AuctionTimerPhase = "idle";
  private fired: Promise<void>;
  private resolveFired: () => void = () => {};

  constructor(state: AuctionState, options: AuctionTimerOptions = {}) {
    this.state = state;
    this.onClose = options.onClose;
    this.fired = new Promise<void>((resolve) => { this.resolveFired = resolve; });
  }

  start(): void {
    if (this.phase !== "idle") {
      throw new Error(`AuctionTimer cannot start from phase "${this.phase}"`);
    }
    this.phase = "waiting";
    this.schedule(this.state.getDurationMs());
  }

  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.phase === "idle" || this.phase === "waiting") {
      this.phase = "disposed";
    }
  }

  getPhase(): AuctionTimerPhase {
    return this.phase;
  }

  /** Resolves once the timer has fired and its close handler has settled. */
  whenFired(): Promise<void> {
    return this.fired;
  }

  // Node turns a longer delay into 1 ms, so long auctions wait in chunks.
  private schedule(remainingMs: number): void {
    const delay = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
    this.timer = setTimeout(() => {
      this.timer = null;
      if (remainingMs > delay) {
        this.schedule(remainingMs - delay);
        return;
      }
      this.fire().catch((err: unknown) => {
        console.error("[bidmesh] auction timer: close handler failed:", err);
      }).finally(() => this.resolveFired());
    }, delay);
    this.timer.unref();
  }

  private async fire(): Promise<void> {
    this.phase = "fired";
    const closed = await this.state.closeIfExpired();
    if (closed && this.onClose) {
      await this.onClose(await this.state.getStatus());
    }
  }
}

/** Create an auction and start its closing timer at the same moment. */
export function startAuction(
  durationMs: number,
  options: AuctionTimerOptions & { now?: () => number } = {},
): { state: AuctionState; timer: AuctionTimer } {
  const state = new AuctionState({ durationMs, now: options.now });
  const timer = new AuctionTimer(state, { onClose: options.onClose });
  timer.start();
  return { state, timer };
}
