/**
 * MCP response helpers.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { CatalogError, describeError } from '../errors.js';

/**
 * Create a JSON content result.
 */
export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error result.
 */
export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * Error result for a thrown error, prefixed with its catalog code.
 */
export function caughtErrorResult(err: unknown): CallToolResult {
  if (err instanceof CatalogError) {
    return errorResult(`${err.code}: ${err.message}`);
  }
  return errorResult(describeError(err));
}
