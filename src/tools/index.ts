/**
 * Tools registry and handlers
 * Central module for all MCP tools
 */

import type { DocsService } from '../docs/api.js';
import {
  ReadDocumentationArgsSchema,
  SearchDocumentationArgsSchema,
  ToolName,
  type ToolCallResponse,
  type ToolDescriptor,
} from '../types/tools.js';
import { readDocumentation } from './read-docs.js';
import { searchDocumentation } from './search-docs.js';
import { formatValidationErrors, validateToolArgs, type ArgumentIssue } from './validation.js';

/**
 * Get all available MCP tools
 */
export function listAllTools(): ToolDescriptor[] {
  return [
    {
      name: ToolName.READ_DOCUMENTATION,
      description:
        'Read a documentation page as Markdown. Accepts a canonical URL or a bare page filename, optionally with a #fragment. Returns the title, canonical URL, body, outbound links and pagination metadata.',
      inputSchema: {
        type: 'object',
        properties: {
          url: {
            type: 'string',
            description: 'Page URL (e.g., "https://doc.qt.io/archives/qt-4.8/qstring.html") or filename (e.g., "qstring.html")',
          },
          fragment: {
            type: 'string',
            description: 'Optional: anchor id of a section (e.g., "details")',
          },
          sectionOnly: {
            type: 'boolean',
            description: 'Return only the fragment section (default: true when fragment is given)',
          },
          startIndex: {
            type: 'number',
            description: 'Character offset to start reading from (default: 0)',
            minimum: 0,
          },
          maxLength: {
            type: 'number',
            description: 'Maximum characters to return; capped by the server',
            minimum: 1,
          },
        },
        required: ['url'],
      },
    },
    {
      name: ToolName.SEARCH_DOCUMENTATION,
      description:
        'Full-text search over the documentation. Supports FTS5 query syntax (phrases, AND/OR/NOT, prefix*). Returns ranked pages with highlighted context.',
      inputSchema: {
        type: 'object',
        properties: {
          query: {
            type: 'string',
            description: 'Search query',
          },
          limit: {
            type: 'number',
            description: 'Maximum number of results to return (default: 10, max: 50)',
            minimum: 1,
            maximum: 50,
          },
        },
        required: ['query'],
      },
    },
  ];
}

/**
 * Call a tool by name
 */
export async function callTool(service: DocsService, name: string, args: unknown): Promise<ToolCallResponse> {
  switch (name) {
    case ToolName.READ_DOCUMENTATION: {
      const validation = validateToolArgs(ReadDocumentationArgsSchema, args);
      if (!validation.success) {
        return invalidArguments(validation.errors);
      }
      return readDocumentation(service, validation.data);
    }

    case ToolName.SEARCH_DOCUMENTATION: {
      const validation = validateToolArgs(SearchDocumentationArgsSchema, args);
      if (!validation.success) {
        return invalidArguments(validation.errors);
      }
      return searchDocumentation(service, validation.data);
    }

    default:
      return {
        content: [{
          type: 'text',
          text: JSON.stringify({
            error: `Unknown tool: ${name}`,
            availableTools: listAllTools().map(t => t.name),
          }, null, 2),
        }],
        isError: true,
      };
  }
}

function invalidArguments(errors: ArgumentIssue[]): ToolCallResponse {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify({
        error: 'Invalid tool arguments',
        details: formatValidationErrors(errors),
      }, null, 2),
    }],
    isError: true,
  };
}

/**
 * Check if a tool name is valid
 */
export function isValidToolName(name: string): boolean {
  const validNames = listAllTools().map(t => t.name);
  return validNames.includes(name);
}

export { readDocumentation } from './read-docs.js';
export { searchDocumentation } from './search-docs.js';
