import type { DeviceDescriptor } from '../types.js';
import { defineMethod, type GatewayContext } from './context.js';
import { listPortsSchema, type ListPortsParams } from './schemas.js';

export function runListPorts(_params: ListPortsParams, context: GatewayContext): Promise<DeviceDescriptor[]> {
  return context.devices.list();
}

export const listPortsMethod = defineMethod({
  name: 'list_ports',
  title: 'List Serial Ports',
  description: 'List serial devices currently attached to the host',
  params: listPortsSchema,
  handler: runListPorts,
});
