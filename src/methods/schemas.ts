/**
 * Method Schemas
 * Zod shapes of each method's params. Value rules (paths, FQBN, ports,
 * baud ranges) live in the validator; these only pin down types.
 */

import { z } from 'zod';

export const DEFAULT_SERIAL_TIMEOUT_SECONDS = 2;
export const MAX_SERIAL_TIMEOUT_SECONDS = 300;

const timeoutSchema = z
  .number()
  .positive()
  .max(MAX_SERIAL_TIMEOUT_SECONDS)
  .optional()
  .default(DEFAULT_SERIAL_TIMEOUT_SECONDS)
  .describe('Seconds to wait for serial input');

const baudrateSchema = z
  .number()
  .optional()
  .describe('Baud rate, integer from 300 to 1000000 (default 115200)');

export const listPortsSchema = z.object({});

export const compileSchema = z.object({
  sketch: z.string().describe('Sketch file or directory, relative to the sketch root or absolute'),
  fqbn: z.string().describe('Fully qualified board name, e.g. arduino:avr:uno'),
});

export const uploadSchema = compileSchema.extend({
  port: z.string().describe('Serial port, e.g. /dev/ttyACM0 or COM3'),
});

export const serialSendSchema = z.object({
  port: z.string().describe('Serial port, e.g. /dev/ttyACM0 or COM3'),
  baudrate: baudrateSchema,
  message: z
    .string()
    .min(1)
    .refine((value) => !/[\r\n]/.test(value), 'message must be a single line')
    .describe('Line to send; a newline is appended'),
  timeout: timeoutSchema,
});

export const readSerialSchema = z.object({
  port: z.string().describe('Serial port, e.g. /dev/ttyACM0 or COM3'),
  baudrate: baudrateSchema,
  timeout: timeoutSchema,
  lines: z.number().int().positive().optional().describe('Stop after this many non-empty lines'),
});

export type ListPortsParams = z.infer<typeof listPortsSchema>;
export type CompileParams = z.infer<typeof compileSchema>;
export type UploadParams = z.infer<typeof uploadSchema>;
export type SerialSendParams = z.infer<typeof serialSendSchema>;
export type ReadSerialParams = z.infer<typeof readSerialSchema>;
