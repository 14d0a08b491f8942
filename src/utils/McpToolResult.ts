import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

/** Wrap a markdown report as MCP text content */
export function toMcpToolResult(text: string): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}
