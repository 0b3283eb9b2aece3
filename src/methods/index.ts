/**
 * Method registry: a fixed name → method table built once at startup.
 * Adding a method means adding an entry here.
 */

import type { GatewayMethod } from './context.js';
import { compileMethod } from './compile.js';
import { listPortsMethod } from './ports.js';
import { readSerialMethod, serialSendMethod } from './serial.js';
import { uploadMethod } from './upload.js';

export type MethodRegistry = ReadonlyMap<string, GatewayMethod>;

export function createMethodRegistry(methods: readonly GatewayMethod[] = [
  listPortsMethod,
  compileMethod,
  uploadMethod,
  serialSendMethod,
  readSerialMethod,
]): MethodRegistry {
  return new Map(methods.map((method) => [method.name, method]));
}

export type { BuildTool, DeviceSource, GatewayContext, GatewayMethod, SerialLine } from './context.js';
export { defineMethod } from './context.js';
