import { randomUUID } from "crypto";
import { isUUID } from "class-validator";

export const REQUEST_ID_HEADER = "x-request-id";

export type RequestIdOrigin = "header" | "query" | "minted";

export type RequestIdDecision = {
  requestId: string;
  origin: RequestIdOrigin;
  rejected?: string;
};

/**
 * Picks the correlation id for a time request. A UUID supplied by the caller
 * is echoed (header before query); anything else is replaced by a fresh v4.
 */
export function decideRequestId(fromHeader?: string, fromQuery?: string): RequestIdDecision {
  const candidates: Array<[RequestIdOrigin, string | undefined]> = [
    ["header", fromHeader?.trim()],
    ["query", fromQuery?.trim()],
  ];

  let rejected: string | undefined;
  for (const [origin, value] of candidates) {
    if (!value) continue;
    if (isUUID(value)) return { requestId: value, origin };
    rejected = rejected ?? value;
  }

  return { requestId: randomUUID(), origin: "minted", rejected };
}
