/**
 * Parameter Validator
 * Checks every value that reaches the build tool or a serial device.
 * Privileged calls only accept the branded types produced here.
 */

import * as path from 'path';
import { z } from 'zod';
import type { SketchPathPolicy } from '../config/gateway.js';
import { isWithinDirectory, pathExistsSync, realPathSync } from '../utils/fs.js';

export const MIN_BAUD_RATE = 300;
export const MAX_BAUD_RATE = 1_000_000;
export const DEFAULT_BAUD_RATE = 115200;

const FQBN_PATTERN = /^\w+:\w+:\w+$/;
const PORT_PATTERN = /^(?:COM\d+|\/dev\/tty[\w.-]+|\/dev\/cu\.[\w.-]+)$/;
const SKETCH_PATH_CHARS = /^[\w\-./]+$/;

export class ValidationError extends Error {
  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export const fqbnSchema = z
  .string({ required_error: 'FQBN is required', invalid_type_error: 'FQBN must be a string' })
  .refine((value) => FQBN_PATTERN.test(value), (value) => ({ message: `Invalid FQBN: ${value}` }))
  .brand<'Fqbn'>();

export const portSchema = z
  .string({ required_error: 'Port is required', invalid_type_error: 'Port must be a string' })
  .refine((value) => PORT_PATTERN.test(value), (value) => ({ message: `Invalid port: ${value}` }))
  .brand<'SerialPortPath'>();

export const baudRateSchema = z
  .number({ required_error: 'Baud rate is required', invalid_type_error: 'Baud rate must be a number' })
  .refine(
    (value) => Number.isInteger(value) && value >= MIN_BAUD_RATE && value <= MAX_BAUD_RATE,
    (value) => ({
      message: `Invalid baud rate: ${value} (expected an integer from ${MIN_BAUD_RATE} to ${MAX_BAUD_RATE})`,
    }),
  )
  .brand<'BaudRate'>();

/**
 * Sketch path rules. The allow-any-path override only lifts the
 * sketch-root containment check; the character set, traversal and
 * denied-root checks always apply. Deny-list and containment are checked
 * on the path as written and again after symlinks are followed.
 */
export function sketchPathSchema(policy: SketchPathPolicy) {
  return z
    .string({ required_error: 'Sketch path is required', invalid_type_error: 'Sketch path must be a string' })
    .min(1, 'Sketch path must not be empty')
    .refine(
      (value) => SKETCH_PATH_CHARS.test(value),
      (value) => ({ message: `Sketch path contains disallowed characters: ${JSON.stringify(value)}` }),
    )
    .refine(
      (value) => !value.split(/[\\/]/).includes('..'),
      (value) => ({ message: `Sketch path must not contain '..' segments: ${value}` }),
    )
    .transform((value, ctx) => {
      const resolved = path.resolve(policy.sketchRoot, value);

      const denied = policy.deniedRoots.find((root) => isWithinDirectory(root, resolved));
      if (denied) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Sketch path ${value} is inside protected directory ${denied}` });
        return z.NEVER;
      }

      if (!policy.allowAnySketchPath && !isWithinDirectory(policy.sketchRoot, resolved)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Sketch path ${value} is not in the allowed directory.` });
        return z.NEVER;
      }

      if (!pathExistsSync(resolved)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Sketch ${value} does not exist.` });
        return z.NEVER;
      }

      // symlinks are checked again at their physical location
      let real: string;
      try {
        real = realPathSync(resolved);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Sketch path ${value} cannot be resolved: ${reason}` });
        return z.NEVER;
      }

      const deniedTarget = policy.deniedRoots.find(
        (root) => isWithinDirectory(root, real) || isWithinDirectory(realPathSync(root), real),
      );
      if (deniedTarget) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Sketch path ${value} resolves into protected directory ${deniedTarget}`,
        });
        return z.NEVER;
      }

      if (!policy.allowAnySketchPath && !isWithinDirectory(realPathSync(policy.sketchRoot), real)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Sketch path ${value} is not in the allowed directory.` });
        return z.NEVER;
      }

      return resolved;
    })
    .brand<'SketchPath'>();
}

export type Fqbn = z.infer<typeof fqbnSchema>;
export type SerialPortPath = z.infer<typeof portSchema>;
export type BaudRate = z.infer<typeof baudRateSchema>;
export type SketchPath = z.infer<ReturnType<typeof sketchPathSchema>>;

function check<T extends z.ZodTypeAny>(schema: T, value: unknown, field: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? `Invalid ${field}`, field);
  }
  return result.data;
}

/**
 * Resolve and check a sketch path; returns the absolute path.
 */
export function validateSketchPath(value: unknown, policy: SketchPathPolicy): SketchPath {
  return check(sketchPathSchema(policy), value, 'sketch');
}

export function validateFqbn(value: unknown): Fqbn {
  return check(fqbnSchema, value, 'fqbn');
}

export function validatePort(value: unknown): SerialPortPath {
  return check(portSchema, value, 'port');
}

/**
 * Omitted values fall back to {@link DEFAULT_BAUD_RATE}.
 */
export function validateBaudRate(value: unknown): BaudRate {
  return check(baudRateSchema, value === undefined ? DEFAULT_BAUD_RATE : value, 'baudrate');
}
