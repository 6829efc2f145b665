export const QueryResponseSchema = {
  type: "object",
  required: ["status", "highest_bid", "highest_bidder", "time_remaining"],
  properties: {
    status: { type: "string", enum: ["ongoing", "ended"] },
    highest_bid: { type: "integer" },
    highest_bidder: { type: "string" },
    time_remaining: { type: "integer" },
    winner: { type: "string" },
  },
} as const;
