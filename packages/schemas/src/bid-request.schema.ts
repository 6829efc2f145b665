export const BidRequestSchema = {
  type: "object",
  required: ["name", "amount"],
  properties: {
    name: { type: "string" },
    amount: { type: "number" },
  },
} as const;

export const BidResponseSchema = {
  type: "object",
  required: ["outcome"],
  properties: {
    outcome: { type: "string", enum: ["success", "fail", "auction ended"] },
    reason: { type: "string" },
  },
  if: { properties: { outcome: { const: "fail" } } },
  then: { required: ["outcome", "reason"] },
} as const;
