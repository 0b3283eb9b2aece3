/**
 * Device Lister
 * Normalizes host serial-port enumeration into device descriptors
 */

import { SerialPort } from 'serialport';
import type { DeviceDescriptor } from '../types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Devices');

const NOT_AVAILABLE = 'n/a';

// Shape of one entry from SerialPort.list()
export interface HostPortInfo {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  pnpId?: string;
  locationId?: string;
  productId?: string;
  vendorId?: string;
  friendlyName?: string;
}

export type PortEnumerator = () => Promise<HostPortInfo[]>;

/**
 * Human-readable label: friendly name, then manufacturer.
 */
export function describePort(info: HostPortInfo): string {
  return info.friendlyName || info.manufacturer || NOT_AVAILABLE;
}

/**
 * Hardware id in the familiar `USB VID:PID=2341:0043 SER=... LOCATION=...` form.
 * Falls back to the PnP id when USB ids are unknown.
 */
export function formatHardwareId(info: HostPortInfo): string {
  if (info.vendorId && info.productId) {
    const parts = [`USB VID:PID=${info.vendorId.toUpperCase()}:${info.productId.toUpperCase()}`];
    if (info.serialNumber) {
      parts.push(`SER=${info.serialNumber}`);
    }
    if (info.locationId) {
      parts.push(`LOCATION=${info.locationId}`);
    }
    return parts.join(' ');
  }
  return info.pnpId || NOT_AVAILABLE;
}

export function toDeviceDescriptor(info: HostPortInfo): DeviceDescriptor {
  return {
    device: info.path,
    description: describePort(info),
    hwid: formatHardwareId(info),
  };
}

/**
 * Enumerates on every call; the attached set can change between calls.
 */
export class DeviceLister {
  constructor(private readonly enumerate: PortEnumerator = () => SerialPort.list()) {}

  async list(): Promise<DeviceDescriptor[]> {
    const ports = await this.enumerate();
    logger.info('Enumerated serial ports', { count: ports.length });
    return ports.map(toDeviceDescriptor);
  }
}
