import { describe, it, expect, afterEach } from 'vitest';
import type { MockPortBinding } from '@serialport/binding-mock';
import { SerialPortMock } from 'serialport';
import {
  SerialIoError,
  SerialTransceiver,
  type SerialLink,
  type SerialLinkFactory,
} from '../src/serial/transceiver.js';
import { validateBaudRate, validatePort } from '../src/validation/validator.js';

// The registry SerialPortMock actually opens against
const MockBinding = SerialPortMock.binding;

const PATH = '/dev/ttyUSB0';
const port = validatePort(PATH);
const baudRate = validateBaudRate(9600);

/**
 * Factory that hands out mock ports and feeds `incoming` once a port opens.
 */
function mockLinks(incoming?: Buffer | string) {
  const opened: SerialPortMock[] = [];
  const bindings: MockPortBinding[] = [];
  const factory: SerialLinkFactory = ({ path, baudRate: rate }) => {
    const link = new SerialPortMock({ path, baudRate: rate, autoOpen: false });
    link.on('open', () => {
      if (!link.port) return;
      bindings.push(link.port);
      if (incoming !== undefined) {
        link.port.emitData(incoming);
      }
    });
    opened.push(link);
    return link;
  };
  return { factory, opened, bindings };
}

/**
 * Link whose open completes only after `openDelayMs`.
 */
class SlowOpeningLink implements SerialLink {
  isOpen = false;
  closeCalls = 0;

  constructor(private readonly openDelayMs: number) {}

  open(callback: (err: Error | null) => void): void {
    setTimeout(() => {
      this.isOpen = true;
      callback(null);
    }, this.openDelayMs);
  }

  write(_data: string, callback: (err: Error | null | undefined) => void): boolean {
    callback(null);
    return true;
  }

  drain(callback: (err: Error | null) => void): void {
    callback(null);
  }

  close(callback: (err: Error | null) => void): void {
    this.closeCalls += 1;
    this.isOpen = false;
    callback(null);
  }

  pipe<T extends NodeJS.WritableStream>(destination: T): T {
    return destination;
  }

  unpipe(): this {
    return this;
  }

  on(): this {
    return this;
  }

  off(): this {
    return this;
  }
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('SerialTransceiver', () => {
  afterEach(() => {
    MockBinding.reset();
  });

  describe('read', () => {
    it('should stop after the requested number of lines', async () => {
      MockBinding.createPort(PATH, { echo: false, record: false });
      const { factory } = mockLinks('one\r\ntwo\nthree\nfour\nfive\n');
      const transceiver = new SerialTransceiver(factory);

      const result = await transceiver.read({ port, baudRate, timeoutMs: 5000, maxLines: 3 });

      expect(result.lines).toEqual(['one', 'two', 'three']);
      expect(result.stoppedBy).toBe('count');
      expect(result.elapsedSeconds).toBeLessThan(5);
    });

    it('should skip blank lines', async () => {
      MockBinding.createPort(PATH, { echo: false, record: false });
      const { factory } = mockLinks('a\n\n   \nb\n');
      const transceiver = new SerialTransceiver(factory);

      const result = await transceiver.read({ port, baudRate, timeoutMs: 5000, maxLines: 2 });

      expect(result.lines).toEqual(['a', 'b']);
    });

    it('should include an unterminated last line when the timeout passes', async () => {
      MockBinding.createPort(PATH, { echo: false, record: false });
      const { factory } = mockLinks('only\npartial ');
      const transceiver = new SerialTransceiver(factory);

      const result = await transceiver.read({ port, baudRate, timeoutMs: 200, maxLines: 5 });

      expect(result.lines).toEqual(['only', 'partial']);
      expect(result.stoppedBy).toBe('timeout');
    });

    it('should return no lines from a silent port after the timeout', async () => {
      MockBinding.createPort(PATH, { echo: false, record: false });
      const { factory } = mockLinks();
      const transceiver = new SerialTransceiver(factory);

      const result = await transceiver.read({ port, baudRate, timeoutMs: 200 });

      expect(result.lines).toEqual([]);
      expect(result.stoppedBy).toBe('timeout');
      expect(result.elapsedSeconds).toBeGreaterThanOrEqual(0.19);
    });

    it('should replace invalid UTF-8 with the replacement character', async () => {
      MockBinding.createPort(PATH, { echo: false, record: false });
      const { factory } = mockLinks(Buffer.from([0x68, 0x69, 0xff, 0x0a]));
      const transceiver = new SerialTransceiver(factory);

      const result = await transceiver.read({ port, baudRate, timeoutMs: 5000, maxLines: 1 });

      expect(result.lines).toEqual(['hi\uFFFD']);
    });

    it('should close the port afterwards', async () => {
      MockBinding.createPort(PATH, { echo: false, record: false });
      const { factory, opened } = mockLinks('x\n');
      const transceiver = new SerialTransceiver(factory);

      await transceiver.read({ port, baudRate, timeoutMs: 5000, maxLines: 1 });

      expect(opened).toHaveLength(1);
      expect(opened[0]?.isOpen).toBe(false);
    });

    it('should raise SerialIoError when the port cannot be opened', async () => {
      const { factory } = mockLinks();
      const transceiver = new SerialTransceiver(factory);

      await expect(transceiver.read({ port, baudRate, timeoutMs: 200 })).rejects.toBeInstanceOf(SerialIoError);
      await expect(transceiver.read({ port, baudRate, timeoutMs: 200 })).rejects.toThrow(/^Opening port failed: /);
    });

    it('should close a port that opens after the deadline', async () => {
      const link = new SlowOpeningLink(100);
      const transceiver = new SerialTransceiver(() => link, { openTimeoutMs: 20 });

      await expect(transceiver.read({ port, baudRate, timeoutMs: 200 })).rejects.toThrow(
        'Opening port timed out after 20 ms',
      );
      await sleep(250);

      expect(link.closeCalls).toBe(1);
      expect(link.isOpen).toBe(false);
    });

    it('should raise SerialIoError when the factory throws', async () => {
      const transceiver = new SerialTransceiver(() => {
        throw new Error('no such device');
      });

      await expect(transceiver.read({ port, baudRate, timeoutMs: 200 })).rejects.toThrow(
        'Cannot create serial port: no such device',
      );
    });
  });

  describe('send', () => {
    it('should write the message with a newline and return the reply line', async () => {
      MockBinding.createPort(PATH, { echo: true, record: true });
      const { factory, opened, bindings } = mockLinks();
      const transceiver = new SerialTransceiver(factory);

      const response = await transceiver.send({ port, baudRate, message: 'ping', timeoutMs: 5000 });

      expect(response).toBe('ping');
      expect(bindings[0]?.recording.toString('utf8')).toBe('ping\n');
      expect(opened[0]?.isOpen).toBe(false);
    });

    it('should return an empty string when nothing comes back', async () => {
      MockBinding.createPort(PATH, { echo: false, record: false });
      const { factory } = mockLinks();
      const transceiver = new SerialTransceiver(factory);

      const response = await transceiver.send({ port, baudRate, message: 'ping', timeoutMs: 200 });

      expect(response).toBe('');
    });

    it('should return a reply that never gets its newline', async () => {
      MockBinding.createPort(PATH, { echo: false, record: false });
      const { factory } = mockLinks('OK');
      const transceiver = new SerialTransceiver(factory);

      const response = await transceiver.send({ port, baudRate, message: 'AT', timeoutMs: 300 });

      expect(response).toBe('OK');
    });
  });
});
