import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

// Result shape every tool handler returns to the MCP server
export type ServerResult = CallToolResult;

export type ToolHandler = (args: unknown) => Promise<ServerResult>;
