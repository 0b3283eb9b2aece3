/**
 * Request Dispatcher
 * Reads one JSON request per line, runs it to completion, writes one
 * JSON response per line. Requests are handled strictly in order.
 */

import * as readline from 'readline';
import { ZodError } from 'zod';
import type { GatewayContext, MethodRegistry } from '../methods/index.js';
import { ValidationError } from '../validation/validator.js';
import { createLogger } from '../utils/logger.js';
import {
  ErrorCode,
  errorResponse,
  isRequestId,
  successResponse,
  type GatewayResponse,
  type RequestId,
} from './protocol.js';

const logger = createLogger('Dispatcher');

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function writeLine(output: NodeJS.WritableStream, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(`${text}\n`, (err) => (err ? reject(err) : resolve()));
  });
}

export class RequestDispatcher {
  constructor(
    private readonly registry: MethodRegistry,
    private readonly context: GatewayContext,
  ) {}

  /**
   * Handle one raw input line. Resolves to null when nothing is to be
   * written (blank line, or a notification that succeeded).
   */
  async handleLine(line: string): Promise<GatewayResponse | null> {
    const text = line.trim();
    if (!text) {
      return null;
    }

    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch (error) {
      logger.error('Parse error', { error: describeError(error) });
      return errorResponse(null, ErrorCode.ParseError, 'Parse error');
    }

    return this.handleMessage(message);
  }

  /**
   * Handle one decoded request object.
   */
  async handleMessage(message: unknown): Promise<GatewayResponse | null> {
    if (!isPlainObject(message)) {
      return errorResponse(null, ErrorCode.InvalidRequest, 'Invalid request: expected a JSON object');
    }

    // a request without an id member is a notification
    const isNotification = !('id' in message);
    let id: RequestId = null;
    if (!isNotification) {
      if (!isRequestId(message.id)) {
        return errorResponse(null, ErrorCode.InvalidRequest, 'Invalid request: id must be a number, string or null');
      }
      id = message.id;
    }

    const methodName = message.method;
    const method = typeof methodName === 'string' ? this.registry.get(methodName) : undefined;
    if (!method) {
      const label = typeof methodName === 'string' ? methodName : JSON.stringify(methodName ?? null);
      logger.error('Method not found', { method: label });
      return errorResponse(id, ErrorCode.MethodNotFound, `Method not found: ${label}`);
    }

    const params = message.params ?? {};
    if (!isPlainObject(params)) {
      return errorResponse(id, ErrorCode.InvalidParams, 'Invalid params: params must be an object');
    }

    try {
      const data = await method.invoke(params, this.context);
      if (isNotification) {
        return null;
      }
      return successResponse(id, data);
    } catch (error) {
      return this.toErrorResponse(id, method.name, error);
    }
  }

  private toErrorResponse(id: RequestId, method: string, error: unknown): GatewayResponse {
    if (error instanceof ValidationError) {
      logger.error('Invalid params', { method, field: error.field, error: error.message });
      return errorResponse(id, ErrorCode.InvalidParams, `Invalid params: ${error.message}`);
    }
    if (error instanceof ZodError) {
      const message = formatZodIssues(error);
      logger.error('Invalid params', { method, error: message });
      return errorResponse(id, ErrorCode.InvalidParams, `Invalid params: ${message}`, {
        issues: error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
      });
    }

    logger.error(`Internal error in method ${method}`, {
      error: describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return errorResponse(id, ErrorCode.InternalError, `Internal error: ${describeError(error)}`);
  }

  /**
   * Serve until `input` ends. The next line is read only after the
   * previous response has been written.
   */
  async serve(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): Promise<void> {
    const lines = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });
    logger.info('Dispatcher ready', { methods: [...this.registry.keys()] });

    for await (const line of lines) {
      let response: GatewayResponse | null;
      try {
        response = await this.handleLine(line);
      } catch (error) {
        logger.error('Unhandled dispatcher failure', { error: describeError(error) });
        response = errorResponse(null, ErrorCode.InternalError, `Internal error: ${describeError(error)}`);
      }
      if (response) {
        await writeLine(output, JSON.stringify(response));
      }
    }

    logger.info('Input closed; dispatcher stopping');
  }
}
