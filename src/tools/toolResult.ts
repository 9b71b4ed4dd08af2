import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { OperationResult } from "../domain/errors.js";

export function jsonToolResult(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/** Failures are reported to the client as tool errors, not protocol errors. */
export function operationToolResult<T>(result: OperationResult<T>): CallToolResult {
  if (result.ok) {
    return jsonToolResult(result.value);
  }
  return {
    ...jsonToolResult({ error: { kind: result.error.kind, message: result.error.message } }),
    isError: true,
  };
}
