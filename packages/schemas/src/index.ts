export * from "./types.js";
export { BidRequestSchema, BidResponseSchema } from "./bid-request.schema.js";
export { QueryResponseSchema } from "./query-response.schema.js";
export { OpLogEventSchema } from "./oplog-event.schema.js";
export {
  validateBidRequestData,
  validateBidResponseData,
  validateQueryResponseData,
  validateOpLogEventData,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
