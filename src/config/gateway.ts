/**
 * Gateway Configuration
 * Reads the process environment once at startup into a frozen snapshot
 */

import * as path from 'path';
import { z } from 'zod';
import type { LogLevel } from '../utils/logger.js';

export const DEFAULT_DENIED_ROOTS: readonly string[] = [
  '/etc',
  '/bin',
  '/sbin',
  '/usr/bin',
  '/usr/sbin',
  '/boot',
  '/proc',
  '/sys',
  '/dev',
];

export const DEFAULT_CLI_TIMEOUT_SECONDS = 60;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);
const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

export type TransportKind = 'jsonl' | 'mcp';

export interface GatewayConfig {
  sketchRoot: string;
  /** Skips the sketch-root containment check only; deny-list and character checks still apply. */
  allowAnySketchPath: boolean;
  deniedRoots: readonly string[];
  cliPath: string;
  cliTimeoutMs: number;
  transport: TransportKind;
  logLevel: LogLevel;
}

export type SketchPathPolicy = Pick<GatewayConfig, 'sketchRoot' | 'allowAnySketchPath' | 'deniedRoots'>;

const envSchema = z.object({
  SKETCH_GATEWAY_SKETCH_DIR: z.string().min(1).optional(),
  SKETCH_GATEWAY_ALLOW_ANY_PATH: z
    .string()
    .optional()
    .transform((value) => value !== undefined && TRUTHY.has(value.trim().toLowerCase())),
  SKETCH_GATEWAY_DENIED_ROOTS: z
    .string()
    .optional()
    .transform((value) => (value ?? '').split(path.delimiter).map((entry) => entry.trim()).filter(Boolean)),
  ARDUINO_CLI: z.string().min(1).optional().default('arduino-cli'),
  SKETCH_GATEWAY_CLI_TIMEOUT: z.coerce.number().positive().max(3600).optional().default(DEFAULT_CLI_TIMEOUT_SECONDS),
  SKETCH_GATEWAY_TRANSPORT: z.enum(['jsonl', 'mcp']).optional().default('jsonl'),
  LOG_LEVEL: z.string().toLowerCase().pipe(z.enum(LOG_LEVEL_NAMES)).optional().default('info'),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build the configuration snapshot from an environment map.
 * @param cwd base for a relative sketch directory
 */
export function loadGatewayConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Readonly<GatewayConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  const deniedRoots = [...DEFAULT_DENIED_ROOTS, ...values.SKETCH_GATEWAY_DENIED_ROOTS]
    .map((root) => path.resolve(root));

  return Object.freeze({
    sketchRoot: path.resolve(cwd, values.SKETCH_GATEWAY_SKETCH_DIR ?? 'sketches'),
    allowAnySketchPath: values.SKETCH_GATEWAY_ALLOW_ANY_PATH,
    deniedRoots: Object.freeze([...new Set(deniedRoots)]),
    cliPath: values.ARDUINO_CLI,
    cliTimeoutMs: values.SKETCH_GATEWAY_CLI_TIMEOUT * 1000,
    transport: values.SKETCH_GATEWAY_TRANSPORT,
    logLevel: values.LOG_LEVEL,
  });
}
