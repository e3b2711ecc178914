/**
 * Shared Tool Utilities
 *
 * Tool definition type, response formatting and the uniform error handler.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { MCPError, formatErrorResponse } from '../server/errors.js';
import { isRecord } from '../services/storage/database/converters.js';

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

/** Serialized responses above this size get their lists cut down (700KB) */
export const MAX_RESPONSE_BYTES = 700 * 1024;

interface ListCut {
  shown: number;
  total: number;
}

const serialize = (value: unknown): string => JSON.stringify(value, null, 2);

/**
 * Format a tool result as MCP content. A result too large to send has the
 * lists in its `data` halved, largest first, and a `response_truncated`
 * note naming what was cut.
 */
export function formatResponse(result: unknown, maxBytes: number = MAX_RESPONSE_BYTES): ToolResponse {
  const json = serialize(result);
  if (json.length <= maxBytes || !isRecord(result) || !isRecord(result.data)) {
    return { content: [{ type: 'text', text: json }] };
  }
  return {
    content: [{ type: 'text', text: serialize({ ...result, data: shrinkLists(result.data, maxBytes) }) }],
  };
}

function shrinkLists(data: Record<string, unknown>, maxBytes: number): Record<string, unknown> {
  const copy: Record<string, unknown> = { ...data };
  const cuts: Record<string, ListCut> = {};
  const withNote = (): Record<string, unknown> => ({
    ...copy,
    response_truncated: {
      lists: cuts,
      suggestion: 'Narrow the request (limit, filters or a smaller folder) to see every entry',
    },
  });

  while (serialize({ success: true, data: withNote() }).length > maxBytes) {
    let largestKey: string | null = null;
    let largestSize = 0;
    for (const [key, value] of Object.entries(copy)) {
      if (Array.isArray(value) && value.length > 0) {
        const size = JSON.stringify(value).length;
        if (size > largestSize) {
          largestKey = key;
          largestSize = size;
        }
      }
    }
    if (largestKey === null) {
      break;
    }

    const list = copy[largestKey];
    if (!Array.isArray(list)) {
      break;
    }
    const kept = list.slice(0, Math.floor(list.length / 2));
    cuts[largestKey] = { shown: kept.length, total: cuts[largestKey]?.total ?? list.length };
    copy[largestKey] = kept;
  }

  console.error(`[WARN] Response over ${maxBytes} bytes, truncated: ${Object.keys(cuts).join(', ')}`);
  return withNote();
}

/**
 * Handle errors uniformly - FAIL FAST
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(mcpError), null, 2) }],
    isError: true,
  };
}
