/**
 * Serial Transceiver
 * One open/close cycle per operation: write a line and read the reply,
 * or collect lines until a count or a deadline is reached.
 *
 * Two concurrent operations on the same port are not arbitrated here;
 * whatever exclusivity the OS driver gives is all there is.
 */

import { ReadlineParser, SerialPort } from 'serialport';
import type { LineReadResult, ReadStopReason } from '../types.js';
import type { BaudRate, SerialPortPath } from '../validation/validator.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Serial');

export const OPEN_TIMEOUT_MS = 5_000;
export const WRITE_TIMEOUT_MS = 5_000;
export const CLOSE_TIMEOUT_MS = 2_000;

type ErrorCallback = (err: Error | null) => void;

/**
 * The slice of a serialport stream this module relies on.
 * `SerialPort` and `SerialPortMock` both satisfy it.
 */
export interface SerialLink {
  readonly isOpen: boolean;
  open(callback: ErrorCallback): void;
  write(data: string, callback: (err: Error | null | undefined) => void): boolean;
  drain(callback: ErrorCallback): void;
  close(callback: ErrorCallback): void;
  pipe<T extends NodeJS.WritableStream>(destination: T): T;
  unpipe(destination?: NodeJS.WritableStream): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  off(event: 'error', listener: (err: Error) => void): unknown;
}

export type SerialLinkFactory = (options: { path: string; baudRate: number }) => SerialLink;

export const openHardwarePort: SerialLinkFactory = ({ path, baudRate }) =>
  new SerialPort({ path, baudRate, autoOpen: false });

export class SerialIoError extends Error {
  constructor(message: string, readonly port: string) {
    super(message);
    this.name = 'SerialIoError';
  }
}

export interface SendLineOptions {
  port: SerialPortPath;
  baudRate: BaudRate;
  message: string;
  timeoutMs: number;
}

export interface ReadLinesOptions {
  port: SerialPortPath;
  baudRate: BaudRate;
  timeoutMs: number;
  maxLines?: number;
}

interface CollectOptions {
  timeoutMs: number;
  maxLines?: number;
  keepEmpty: boolean;
  beforeRead?: () => Promise<void>;
}

export interface SerialTransceiverOptions {
  openTimeoutMs?: number;
  writeTimeoutMs?: number;
  closeTimeoutMs?: number;
}

/**
 * Run a callback-style action with a deadline. `onLate` receives a
 * completion that arrives after the deadline already rejected.
 */
function withDeadline<T>(
  label: string,
  port: string,
  ms: number,
  action: (done: (err: Error | null, value: T) => void) => void,
  onLate?: (err: Error | null) => void,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let expired = false;
    const timer = setTimeout(() => {
      expired = true;
      reject(new SerialIoError(`${label} timed out after ${ms} ms`, port));
    }, ms);
    action((err, value) => {
      if (expired) {
        onLate?.(err);
        return;
      }
      clearTimeout(timer);
      if (err) {
        reject(new SerialIoError(`${label} failed: ${err.message}`, port));
      } else {
        resolve(value);
      }
    });
  });
}

export class SerialTransceiver {
  private readonly openTimeoutMs: number;
  private readonly writeTimeoutMs: number;
  private readonly closeTimeoutMs: number;

  constructor(
    private readonly openLink: SerialLinkFactory = openHardwarePort,
    options: SerialTransceiverOptions = {},
  ) {
    this.openTimeoutMs = options.openTimeoutMs ?? OPEN_TIMEOUT_MS;
    this.writeTimeoutMs = options.writeTimeoutMs ?? WRITE_TIMEOUT_MS;
    this.closeTimeoutMs = options.closeTimeoutMs ?? CLOSE_TIMEOUT_MS;
  }

  /**
   * Write `message` plus a newline, then wait for one reply line.
   * At the timeout an unterminated reply is returned as it stands,
   * or '' when nothing arrived.
   */
  async send(options: SendLineOptions): Promise<string> {
    logger.info('Serial send', { port: options.port, baudRate: options.baudRate, message: options.message });
    return this.withLink(options.port, options.baudRate, async (link) => {
      const result = await this.collect(link, options.port, {
        timeoutMs: options.timeoutMs,
        maxLines: 1,
        keepEmpty: true,
        beforeRead: () => this.writeLine(link, options.port, options.message),
      });
      return result.lines[0] ?? '';
    });
  }

  /**
   * Collect non-empty lines until `maxLines` is reached or `timeoutMs` passes.
   * A trailing line still missing its newline at the timeout is included.
   */
  async read(options: ReadLinesOptions): Promise<LineReadResult> {
    logger.info('Serial read', {
      port: options.port,
      baudRate: options.baudRate,
      timeoutMs: options.timeoutMs,
      maxLines: options.maxLines,
    });
    return this.withLink(options.port, options.baudRate, (link) =>
      this.collect(link, options.port, {
        timeoutMs: options.timeoutMs,
        maxLines: options.maxLines,
        keepEmpty: false,
      }),
    );
  }

  private async withLink<T>(port: SerialPortPath, baudRate: BaudRate, use: (link: SerialLink) => Promise<T>): Promise<T> {
    let link: SerialLink;
    try {
      link = this.openLink({ path: port, baudRate });
    } catch (error) {
      throw new SerialIoError(`Cannot create serial port: ${error instanceof Error ? error.message : String(error)}`, port);
    }

    await withDeadline<void>(
      'Opening port',
      port,
      this.openTimeoutMs,
      (done) => link.open((err) => done(err, undefined)),
      (err) => {
        if (err) return;
        // the caller has already given up; release the port it never got
        logger.warn('Port opened after the deadline; closing it', { port });
        void this.closeLink(link, port);
      },
    );
    logger.debug('Port opened', { port, baudRate });

    try {
      return await use(link);
    } finally {
      await this.closeLink(link, port);
    }
  }

  private async closeLink(link: SerialLink, port: string): Promise<void> {
    if (!link.isOpen) {
      return;
    }
    try {
      await withDeadline<void>('Closing port', port, this.closeTimeoutMs, (done) => link.close((err) => done(err, undefined)));
      logger.debug('Port closed', { port });
    } catch (error) {
      // the operation's own result or error takes precedence over a failed close
      logger.warn('Failed to close port', { port, error: error instanceof Error ? error.message : String(error) });
    }
  }

  private async writeLine(link: SerialLink, port: string, message: string): Promise<void> {
    await withDeadline<void>('Writing to port', port, this.writeTimeoutMs, (done) => {
      link.write(`${message}\n`, (err) => {
        if (err) {
          done(err, undefined);
          return;
        }
        link.drain((drainErr) => done(drainErr, undefined));
      });
    });
  }

  private collect(link: SerialLink, port: string, options: CollectOptions): Promise<LineReadResult> {
    // invalid UTF-8 decodes to U+FFFD instead of failing
    const parser = link.pipe(new ReadlineParser({ delimiter: '\n', encoding: 'utf8' }));
    const started = performance.now();

    return new Promise<LineReadResult>((resolve, reject) => {
      const lines: string[] = [];
      let settled = false;
      let draining = false;
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        parser.off('data', onData);
        parser.off('end', onEnd);
        link.off('error', onError);
        link.unpipe(parser);
        parser.destroy();
      };

      const finish = (stoppedBy: ReadStopReason) => {
        if (settled) return;
        cleanup();
        const elapsedSeconds = (performance.now() - started) / 1000;
        logger.debug('Serial read finished', { port, lines: lines.length, stoppedBy });
        resolve({ lines, stoppedBy, elapsedSeconds });
      };

      const fail = (error: unknown) => {
        if (settled) return;
        cleanup();
        reject(error instanceof SerialIoError
          ? error
          : new SerialIoError(error instanceof Error ? error.message : String(error), port));
      };

      const onData = (chunk: string | Buffer) => {
        const line = chunk.toString().trim();
        if (!line && !options.keepEmpty) return;
        lines.push(line);
        if (!draining && options.maxLines !== undefined && lines.length >= options.maxLines) {
          finish('count');
        }
      };

      const onError = (err: Error) => fail(err);

      // ending the parser flushes an unterminated trailing line as one last chunk
      const onEnd = () => finish('timeout');

      const drainPartial = () => {
        if (settled) return;
        draining = true;
        link.unpipe(parser);
        parser.end();
      };

      const startDeadline = () => {
        if (settled) return;
        timer = setTimeout(drainPartial, options.timeoutMs);
      };

      parser.on('data', onData);
      parser.on('end', onEnd);
      link.on('error', onError);

      if (options.beforeRead) {
        void options.beforeRead().then(startDeadline, fail);
      } else {
        startDeadline();
      }
    });
  }
}
