import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { BidRequestSchema, BidResponseSchema } from "./bid-request.schema.js";
import { QueryResponseSchema } from "./query-response.schema.js";
import { OpLogEventSchema } from "./oplog-event.schema.js";
import type { BidRequest, BidResponse, QueryResponse, OpLogEvent } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats has a nested .default in ESM due to CJS interop — resolve it safely.
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const validateBidRequest: ValidateFunction<BidRequest> = ajv.compile<BidRequest>(BidRequestSchema);
const validateBidResponse: ValidateFunction<BidResponse> = ajv.compile<BidResponse>(BidResponseSchema);
const validateQueryResponse: ValidateFunction<QueryResponse> = ajv.compile<QueryResponse>(QueryResponseSchema);
const validateOpLogEvent: ValidateFunction<OpLogEvent> = ajv.compile<OpLogEvent>(OpLogEventSchema);

export type ValidationResult<T> =
  | { valid: true; data: T; errors: [] }
  | { valid: false; errors: string[] };

function check<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) return { valid: true, data, errors: [] };
  return { valid: false, errors: formatErrors(validate.errors) };
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
}

export function validateBidRequestData(data: unknown): ValidationResult<BidRequest> {
  return check(validateBidRequest, data);
}

export function validateBidResponseData(data: unknown): ValidationResult<BidResponse> {
  return check(validateBidResponse, data);
}

export function validateQueryResponseData(data: unknown): ValidationResult<QueryResponse> {
  return check(validateQueryResponse, data);
}

export function validateOpLogEventData(data: unknown): ValidationResult<OpLogEvent> {
  return check(validateOpLogEvent, data);
}
