/**
 * MCP Tool type definitions
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

/**
 * Tool descriptor interface
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * Tool call response interface - uses MCP SDK type
 */
export type ToolCallResponse = CallToolResult;

/**
 * Read documentation arguments schema
 */
export const ReadDocumentationArgsSchema = z
  .object({
    url: z.string().min(1),
    fragment: z.string().optional(),
    sectionOnly: z.boolean().optional(),
    startIndex: z.number().int().min(0).optional(),
    maxLength: z.number().int().min(1).optional(),
  })
  .strict();

export type ReadDocumentationArgs = z.infer<typeof ReadDocumentationArgsSchema>;

/**
 * Search documentation arguments schema
 */
export const SearchDocumentationArgsSchema = z
  .object({
    query: z.string(),
    limit: z.number().int().min(1).max(50).optional(),
  })
  .strict();

export type SearchDocumentationArgs = z.infer<typeof SearchDocumentationArgsSchema>;

/**
 * Tool names enum
 */
export enum ToolName {
  READ_DOCUMENTATION = 'read_documentation',
  SEARCH_DOCUMENTATION = 'search_documentation',
}
