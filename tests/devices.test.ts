import { describe, it, expect, vi } from 'vitest';
import {
  DeviceLister,
  describePort,
  formatHardwareId,
  toDeviceDescriptor,
  type HostPortInfo,
} from '../src/serial/devices.js';

const uno: HostPortInfo = {
  path: '/dev/ttyACM0',
  manufacturer: 'Arduino (www.arduino.cc)',
  serialNumber: '95736323632351E0A1E1',
  vendorId: '2341',
  productId: '0043',
  locationId: '1-1.2',
};

describe('Device Lister', () => {
  describe('describePort', () => {
    it('should prefer the friendly name', () => {
      expect(describePort({ path: 'COM3', friendlyName: 'USB Serial Device (COM3)', manufacturer: 'Microsoft' }))
        .toBe('USB Serial Device (COM3)');
    });

    it('should fall back to the manufacturer, then n/a', () => {
      expect(describePort(uno)).toBe('Arduino (www.arduino.cc)');
      expect(describePort({ path: '/dev/ttyS0' })).toBe('n/a');
    });
  });

  describe('formatHardwareId', () => {
    it('should format USB ids with serial number and location', () => {
      expect(formatHardwareId(uno)).toBe('USB VID:PID=2341:0043 SER=95736323632351E0A1E1 LOCATION=1-1.2');
    });

    it('should upper-case hex ids and omit missing parts', () => {
      expect(formatHardwareId({ path: '/dev/ttyUSB0', vendorId: '1a86', productId: '7523' }))
        .toBe('USB VID:PID=1A86:7523');
    });

    it('should fall back to the PnP id, then n/a', () => {
      expect(formatHardwareId({ path: 'COM1', pnpId: 'ACPI\\PNP0501\\1' })).toBe('ACPI\\PNP0501\\1');
      expect(formatHardwareId({ path: '/dev/ttyS0' })).toBe('n/a');
    });
  });

  describe('toDeviceDescriptor', () => {
    it('should produce device, description and hwid', () => {
      expect(toDeviceDescriptor(uno)).toEqual({
        device: '/dev/ttyACM0',
        description: 'Arduino (www.arduino.cc)',
        hwid: 'USB VID:PID=2341:0043 SER=95736323632351E0A1E1 LOCATION=1-1.2',
      });
    });
  });

  describe('DeviceLister', () => {
    it('should enumerate on every call', async () => {
      const enumerate = vi.fn<[], Promise<HostPortInfo[]>>()
        .mockResolvedValueOnce([])
        .mockResolvedValueOnce([uno]);
      const lister = new DeviceLister(enumerate);

      expect(await lister.list()).toEqual([]);
      expect(await lister.list()).toEqual([toDeviceDescriptor(uno)]);
      expect(enumerate).toHaveBeenCalledTimes(2);
    });

    it('should propagate enumeration failures', async () => {
      const lister = new DeviceLister(() => Promise.reject(new Error('udev unavailable')));
      await expect(lister.list()).rejects.toThrow('udev unavailable');
    });
  });
});
