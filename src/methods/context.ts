import type { z } from 'zod';
import type { SketchPathPolicy } from '../config/gateway.js';
import type { DeviceLister } from '../serial/devices.js';
import type { SerialTransceiver } from '../serial/transceiver.js';
import type { BuildToolRunner } from '../utils/cli-runner.js';

export type BuildTool = Pick<BuildToolRunner, 'compile' | 'upload'>;
export type SerialLine = Pick<SerialTransceiver, 'send' | 'read'>;
export type DeviceSource = Pick<DeviceLister, 'list'>;

/**
 * Collaborators and policy handed to every method handler.
 */
export interface GatewayContext {
  policy: SketchPathPolicy;
  buildTool: BuildTool;
  serial: SerialLine;
  devices: DeviceSource;
}

export interface GatewayMethod {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly params: z.ZodTypeAny;
  /** Parses raw params (throws ZodError on a shape mismatch) and runs the handler. */
  invoke(params: unknown, context: GatewayContext): Promise<unknown>;
}

export function defineMethod<P, R>(definition: {
  name: string;
  title: string;
  description: string;
  params: z.ZodType<P, z.ZodTypeDef, unknown>;
  handler: (params: P, context: GatewayContext) => Promise<R>;
}): GatewayMethod {
  const { handler, ...meta } = definition;
  return {
    ...meta,
    invoke: (params, context) => handler(definition.params.parse(params), context),
  };
}
