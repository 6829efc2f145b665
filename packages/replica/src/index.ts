export { AuctionState, BID_TOO_LOW_REASON } from "./auction-state.js";
export type { AuctionStateOptions } from "./auction-state.js";
export { AuctionTimer, MAX_TIMER_DELAY_MS, startAuction } from "./auction-timer.js";
export type { AuctionTimerOptions, AuctionTimerPhase } from "./auction-timer.js";
export { ReadWriteLock } from "./rw-lock.js";
export { ReplicaServer } from "./replica-server.js";
export type { ReplicaServerConfig } from "./replica-server.js";
export { toBidResponse, toQueryResponse } from "./wire.js";
