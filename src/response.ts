/**
 * JSON response envelope shared by every MCP tool handler:
 * { success, tool, data, metadata }.
 */

import type { ErrorCategory } from "./errors/inventory-error.js";
import { InventoryError } from "./errors/inventory-error.js";

export interface ToolResponse {
  success: boolean;
  tool: string;
  data: Record<string, unknown>;
  error?: string;
  error_code?: string;
  error_category?: ErrorCategory;
  remediation?: string;
  metadata: {
    elapsed_ms: number;
  };
}

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

const COMPACT_THRESHOLD = 32 * 1024;

/**
 * Build a success response envelope.
 */
export function formatResponse(
  tool: string,
  data: Record<string, unknown>,
  startTime: number,
): ToolResult {
  const envelope: ToolResponse = {
    success: true,
    tool,
    data,
    metadata: { elapsed_ms: Date.now() - startTime },
  };
  // Large device lists are sent compact
  const compact = JSON.stringify(envelope);
  const text = compact.length > COMPACT_THRESHOLD ? compact : JSON.stringify(envelope, null, 2);
  return {
    content: [{ type: "text", text }],
  };
}

/**
 * Build an error response envelope. Sets `isError: true` on the MCP result.
 * An InventoryError also fills error_code, error_category and remediation.
 */
export function formatError(
  tool: string,
  error: string | InventoryError,
  startTime: number,
): ToolResult & { isError: true } {
  const envelope: ToolResponse = {
    success: false,
    tool,
    data: {},
    error: error instanceof InventoryError ? error.message : error,
    metadata: { elapsed_ms: Date.now() - startTime },
  };

  if (error instanceof InventoryError) {
    envelope.error_code = error.code;
    envelope.error_category = error.category;
    if (error.remediation) {
      envelope.remediation = error.remediation;
    }
  }

  return {
    content: [{ type: "text", text: JSON.stringify(envelope, null, 2) }],
    isError: true,
  };
}
