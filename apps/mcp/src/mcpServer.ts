import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { isToolErrorPayload } from '@errors';

import type { AnalyticsTool, ToolOutput } from './tools/analyticsTools';

export const SERVER_NAME = 'ga4-multi-property';
export const SERVER_VERSION = '1.0.0';

export interface ToolCallResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError: boolean;
}

/**
* Tool output as an MCP result: one JSON text block, flagged when it is an error
*/
export function toCallToolResult(output: ToolOutput): ToolCallResult {
  return {
  content: [{ type: 'text', text: JSON.stringify(output, null, 2) }],
  isError: isToolErrorPayload(output),
  };
}

/**
* MCP server exposing the analytics tools. Not yet connected to a transport.
*/
export function createMcpServer(tools: readonly AnalyticsTool[]): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  for (const tool of tools) {
  server.tool(tool.name, tool.description, tool.shape, async args => toCallToolResult(await tool.execute(args)));
  }

  return server;
}
