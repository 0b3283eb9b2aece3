/**
 * serial_send / read_serial: line exchange with a board
 */

import { SerialIoError } from '../serial/transceiver.js';
import { validateBaudRate, validatePort } from '../validation/validator.js';
import { createLogger } from '../utils/logger.js';
import type { SerialReadResult, SerialSendResult } from '../types.js';
import { defineMethod, type GatewayContext } from './context.js';
import { readSerialSchema, serialSendSchema, type ReadSerialParams, type SerialSendParams } from './schemas.js';

const logger = createLogger('SerialMethods');

export async function runSerialSend(params: SerialSendParams, context: GatewayContext): Promise<SerialSendResult> {
  const port = validatePort(params.port);
  const baudRate = validateBaudRate(params.baudrate);

  try {
    const response = await context.serial.send({
      port,
      baudRate,
      message: params.message,
      timeoutMs: params.timeout * 1000,
    });
    return { success: true, response };
  } catch (error) {
    if (error instanceof SerialIoError) {
      logger.error('Serial send failed', { port, error: error.message });
      return { success: false, error: error.message };
    }
    throw error;
  }
}

export async function runReadSerial(params: ReadSerialParams, context: GatewayContext): Promise<SerialReadResult> {
  const port = validatePort(params.port);
  const baudRate = validateBaudRate(params.baudrate);

  try {
    const result = await context.serial.read({
      port,
      baudRate,
      timeoutMs: params.timeout * 1000,
      maxLines: params.lines,
    });
    return { success: true, ...result };
  } catch (error) {
    if (error instanceof SerialIoError) {
      logger.error('Read serial failed', { port, error: error.message });
      return { success: false, error: error.message };
    }
    throw error;
  }
}

export const serialSendMethod = defineMethod({
  name: 'serial_send',
  title: 'Send Serial Line',
  description: 'Write one line to a serial port and return the first line received back',
  params: serialSendSchema,
  handler: runSerialSend,
});

export const readSerialMethod = defineMethod({
  name: 'read_serial',
  title: 'Read Serial Lines',
  description: 'Collect lines from a serial port until a line count or the timeout is reached',
  params: readSerialSchema,
  handler: runReadSerial,
});
