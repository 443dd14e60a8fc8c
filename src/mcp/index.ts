import { Server, type ServerOptions } from '@modelcontextprotocol/sdk/server/index.js';
import {
  type CallToolResult,
  CallToolRequestSchema,
  type Implementation,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import { isPlainObject } from '../core/serialization/json';
import type { Gateway } from '../gateway/create-gateway';
import { isErrorResponse } from '../gateway/types';

export type CreateMCPOptions = ServerOptions & {
  serverInfo?: Implementation;
};

const DEFAULT_SERVER_INFO: Implementation = {
  name: 'motorpool',
  version: '0.1.0',
};

/**
 * Serves the gateway's operations as MCP tools. Arguments go to the gateway untouched, so blank
 * values, paging and every error code behave exactly as they do for direct calls.
 */
export function createMCP(gateway: Gateway, options: CreateMCPOptions = {}): Server {
  const { serverInfo, ...serverOptions } = options;
  const server = new Server(serverInfo ?? DEFAULT_SERVER_INFO, {
    ...serverOptions,
    capabilities: { ...serverOptions.capabilities, tools: {} },
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: gateway.describe().map((operation): Tool => {
      const tool: Tool = {
        name: operation.name,
        description: operation.description,
        inputSchema: operation.inputSchema,
        annotations: { readOnlyHint: operation.readOnly, openWorldHint: false },
      };
      if (operation.title !== undefined) tool.title = operation.title;
      return tool;
    }),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const response = await gateway.call(
      {
        operation: request.params.name,
        arguments: request.params.arguments ?? {},
        id: String(extra.requestId),
      },
      { signal: extra.signal },
    );
    return toCallToolResult(response);
  });

  return server;
}

function toCallToolResult(response: Awaited<ReturnType<Gateway['call']>>): CallToolResult {
  if (isErrorResponse(response)) {
    return {
      content: toTextContent(JSON.stringify({ error: response.error }, null, 2)),
      structuredContent: { error: response.error },
      isError: true,
    };
  }
  const { result } = response;
  const content = toTextContent(JSON.stringify(result, null, 2));
  if (isPlainObject(result)) {
    return { content, structuredContent: { ...result } };
  }
  return { content, structuredContent: { result } };
}

function toTextContent(text: string): CallToolResult['content'] {
  return [{ type: 'text' as const, text }];
}
