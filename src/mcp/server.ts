/**
 * MCP adapter: serves the method registry as Model Context Protocol tools
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z, ZodError } from 'zod';
import type { GatewayContext, MethodRegistry } from '../methods/index.js';
import { formatZodIssues } from '../rpc/dispatcher.js';
import { ValidationError } from '../validation/validator.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('MCPServer');

export const SERVER_NAME = 'sketch-gateway';
export const SERVER_VERSION = '1.0.0';

const INSTRUCTIONS = `Sketch gateway for arduino-cli and serial devices. Tools provided:

- list_ports: list attached serial devices
- compile: arduino-cli compile for a sketch under the sketch root
- upload: arduino-cli upload to a board on a serial port
- serial_send: write one line to a serial port and read one line back
- read_serial: collect lines from a serial port until a count or timeout

Sketch paths are resolved against the configured sketch root (SKETCH_GATEWAY_SKETCH_DIR).`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toToolResult(data: unknown, isError = false): CallToolResult {
  const structured = isRecord(data) ? data : { data };
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
    structuredContent: structured,
    ...(isError ? { isError: true } : {}),
  };
}

function toToolError(method: string, error: unknown): CallToolResult {
  if (error instanceof ValidationError) {
    return toToolResult({ error: `Invalid params: ${error.message}` }, true);
  }
  if (error instanceof ZodError) {
    return toToolResult({ error: `Invalid params: ${formatZodIssues(error)}` }, true);
  }
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`Internal error in tool ${method}`, { error: message });
  return toToolResult({ error: `Internal error: ${message}` }, true);
}

/**
 * Register every method as a tool. Calls run one at a time, in arrival order.
 */
export function createMcpServer(registry: MethodRegistry, context: GatewayContext): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION }, { instructions: INSTRUCTIONS });

  let tail: Promise<unknown> = Promise.resolve();
  const enqueue = <T>(task: () => Promise<T>): Promise<T> => {
    const run = tail.then(task, task);
    tail = run;
    return run;
  };

  for (const method of registry.values()) {
    const inputSchema: z.ZodRawShape = method.params instanceof z.ZodObject ? method.params.shape : {};

    server.registerTool(method.name, {
      title: method.title,
      description: method.description,
      inputSchema,
    }, async (args) => enqueue(async () => {
      try {
        return toToolResult(await method.invoke(args, context));
      } catch (error) {
        return toToolError(method.name, error);
      }
    }));
  }

  return server;
}
