export const OpLogEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "source", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    source: { type: "string", minLength: 1 },
    type: {
      type: "string",
      enum: [
        "replica.started", "replica.stopped", "auction.closed",
        "bid.accepted", "bid.rejected", "bid.after_close", "bid.invalid",
        "query.served",
        "coordinator.started",
        "coordinator.bid_requested", "coordinator.bid_replica_outcome",
        "coordinator.bid_replica_failed", "coordinator.bid_completed",
        "coordinator.query_requested", "coordinator.query_replica_failed",
        "coordinator.query_succeeded", "coordinator.query_failed",
        "console.exit",
      ],
    },
    payload: { type: "object" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
