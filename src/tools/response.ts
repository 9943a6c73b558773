/**
 * Tool response helpers
 */

import type { ToolCallResponse } from '../types/tools.js';
import { toDocsError } from '../errors/index.js';

/**
 * Successful response carrying pretty-printed JSON
 */
export function jsonResponse(data: unknown): ToolCallResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

/**
 * Failure response with the error's stable kind and message
 */
export function errorResponse(error: unknown): ToolCallResponse {
  const docsError = toDocsError(error);
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify({ error: docsError.code, message: docsError.message }, null, 2),
      },
    ],
    isError: true,
  };
}
