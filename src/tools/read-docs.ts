/**
 * Documentation read tool
 * Returns one page, or one section of it, as paginated Markdown
 */

import type { DocsService } from '../docs/api.js';
import type { ReadDocumentationArgs, ToolCallResponse } from '../types/tools.js';
import { errorResponse, jsonResponse } from './response.js';

export async function readDocumentation(
  service: DocsService,
  args: ReadDocumentationArgs
): Promise<ToolCallResponse> {
  try {
    const document = await service.readDocument(args);
    return jsonResponse(document);
  } catch (error) {
    return errorResponse(error);
  }
}
