import { describe, it, expect } from "vitest";
import { v4 as uuid } from "uuid";
import {
  validateBidRequestData,
  validateBidResponseData,
  validateQueryResponseData,
  validateOpLogEventData,
} from "./validator.js";

describe("validateBidRequestData", () => {
  it("accepts a well-formed bid", () => {
    const result = validateBidRequestData({ name: "alice", amount: 100 });
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    if (result.valid) expect(result.data).toEqual({ name: "alice", amount: 100 });
  });

  it("accepts a fractional amount (truncation happens later)", () => {
    expect(validateBidRequestData({ name: "alice", amount: 99.9 }).valid).toBe(true);
  });

  it("ignores unknown fields", () => {
    expect(validateBidRequestData({ name: "alice", amount: 1, note: "hi" }).valid).toBe(true);
  });

  it("rejects a missing amount", () => {
    const result = validateBidRequestData({ name: "alice" });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/: must have required property 'amount'"]);
  });

  it("rejects a string amount", () => {
    const result = validateBidRequestData({ name: "alice", amount: "100" });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/amount: must be number"]);
  });

  it("reports every error at once", () => {
    const result = validateBidRequestData({ name: 7 });
    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(2);
  });

  it("rejects non-object bodies", () => {
    expect(validateBidRequestData(null).valid).toBe(false);
    expect(validateBidRequestData([]).valid).toBe(false);
    expect(validateBidRequestData("alice 100").valid).toBe(false);
  });
});

describe("validateBidResponseData", () => {
  it("accepts each outcome", () => {
    expect(validateBidResponseData({ outcome: "success" }).valid).toBe(true);
    expect(validateBidResponseData({ outcome: "fail", reason: "too low" }).valid).toBe(true);
    expect(validateBidResponseData({ outcome: "auction ended" }).valid).toBe(true);
  });

  it("requires a reason on failure", () => {
    expect(validateBidResponseData({ outcome: "fail" }).valid).toBe(false);
  });

  it("rejects unknown outcomes", () => {
    expect(validateBidResponseData({ outcome: "maybe" }).valid).toBe(false);
  });
});

describe("validateQueryResponseData", () => {
  const ongoing = { status: "ongoing", highest_bid: 150, highest_bidder: "bob", time_remaining: 12 };

  it("accepts an ongoing snapshot", () => {
    expect(validateQueryResponseData(ongoing).valid).toBe(true);
  });

  it("accepts an ended snapshot with a winner and a negative remainder", () => {
    const ended = { ...ongoing, status: "ended", time_remaining: -1, winner: "bob" };
    expect(validateQueryResponseData(ended).valid).toBe(true);
  });

  it("rejects an unknown status", () => {
    expect(validateQueryResponseData({ ...ongoing, status: "paused" }).valid).toBe(false);
  });

  it("rejects a fractional highest_bid", () => {
    const result = validateQueryResponseData({ ...ongoing, highest_bid: 1.5 });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/highest_bid: must be integer"]);
  });
});

describe("validateOpLogEventData", () => {
  const event = () => ({
    event_id: uuid(),
    timestamp: new Date().toISOString(),
    source: "replica:8080",
    type: "bid.accepted",
    payload: { name: "alice", amount: 100 },
    seq: 0,
  });

  it("accepts a valid event", () => {
    expect(validateOpLogEventData(event()).valid).toBe(true);
  });

  it("rejects an unknown event type", () => {
    expect(validateOpLogEventData({ ...event(), type: "bid.maybe" }).valid).toBe(false);
  });

  it("rejects a malformed timestamp", () => {
    expect(validateOpLogEventData({ ...event(), timestamp: "yesterday" }).valid).toBe(false);
  });

  it("rejects additional properties", () => {
    expect(validateOpLogEventData({ ...event(), extra: true }).valid).toBe(false);
  });
});
