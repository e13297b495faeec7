// ============================================================================
// Response Helpers
// ============================================================================
// Standardized MCP result formatting for dispatch outcomes.
// ============================================================================

import type { McpCoreError } from '../../errors.js';
import type { ToolResult } from '../types.js';

/**
 * Create a successful tool response. Strings are sent as-is, everything else
 * as pretty-printed JSON.
 */
export function toolSuccess(data: unknown): ToolResult {
  return {
    content: [{
      type: 'text',
      text: typeof data === 'string' ? data : JSON.stringify(data, null, 2),
    }],
  };
}

/**
 * Create an error tool response carrying the error's code and details
 */
export function toolError(error: McpCoreError): ToolResult {
  const payload: Record<string, unknown> = {
    success: false,
    ...error.toJSON(),
  };
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(payload, null, 2),
    }],
    isError: true,
  };
}
