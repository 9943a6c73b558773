/**
 * Documentation search tool
 * Searches the full-text index by query
 */

import type { DocsService } from '../docs/api.js';
import type { SearchDocumentationArgs, ToolCallResponse } from '../types/tools.js';
import { errorResponse, jsonResponse } from './response.js';

/**
 * Search documentation
 */
export async function searchDocumentation(
  service: DocsService,
  args: SearchDocumentationArgs
): Promise<ToolCallResponse> {
  try {
    const response = service.searchDocuments(args.query, args.limit);
    if (response.count === 0) {
      return jsonResponse({
        ...response,
        message: 'No documentation found matching your query. Try different keywords.',
      });
    }
    return jsonResponse(response);
  } catch (error) {
    return errorResponse(error);
  }
}
