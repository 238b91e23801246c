import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";

import { errorKind, errorMessage } from "../utils/asyncUtils.js";

/**
 * Fragments that mark an error as the tool server going away rather than a
 * tool failing. Matched case-insensitively against the error's kind and text.
 */
export const CONNECTION_ERROR_KEYWORDS = [
  "connection",
  "not connected",
  "protocol",
  "remote",
  "disconnect",
  "closed",
  "reset",
  "refused",
  "unreachable",
  "timeout",
  "network",
] as const;

const MAX_CAUSE_DEPTH = 5;

function matchesKeyword(error: unknown): boolean {
  const kind = errorKind(error).toLowerCase();
  const message = errorMessage(error).toLowerCase();
  return CONNECTION_ERROR_KEYWORDS.some(
    (keyword) => kind.includes(keyword) || message.includes(keyword),
  );
}

/**
 * Also inspects the `cause` chain: fetch reports a refused socket as
 * "fetch failed" and keeps the ECONNREFUSED detail on its cause.
 */
export function isConnectionError(error: unknown): boolean {
  let current: unknown = error;
  for (
    let depth = 0;
    depth < MAX_CAUSE_DEPTH && current !== undefined;
    depth++
  ) {
    if (
      current instanceof McpError &&
      current.code === ErrorCode.ConnectionClosed
    ) {
      return true;
    }
    if (matchesKeyword(current)) {
      return true;
    }
    current = current instanceof Error ? current.cause : undefined;
  }
  return false;
}
