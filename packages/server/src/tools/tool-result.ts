import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

/** Wraps a query result as a single JSON text item */
export function jsonResult(value: object): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(value) }]
  };
}
