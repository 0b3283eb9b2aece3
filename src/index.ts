#!/usr/bin/env node
import process from 'node:process';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadGatewayConfig, type GatewayConfig } from './config/gateway.js';
import { createMcpServer } from './mcp/server.js';
import { createMethodRegistry, type GatewayContext } from './methods/index.js';
import { RequestDispatcher } from './rpc/dispatcher.js';
import { DeviceLister } from './serial/devices.js';
import { SerialTransceiver } from './serial/transceiver.js';
import { BuildToolRunner } from './utils/cli-runner.js';
import { createLogger, setLogLevel } from './utils/logger.js';

export * from './types.js';
export * from './config/gateway.js';
export * from './validation/validator.js';
export * from './rpc/protocol.js';
export { RequestDispatcher } from './rpc/dispatcher.js';
export { createMethodRegistry } from './methods/index.js';
export { createMcpServer } from './mcp/server.js';
export { BuildToolRunner } from './utils/cli-runner.js';
export { SerialTransceiver, SerialIoError } from './serial/transceiver.js';
export { DeviceLister } from './serial/devices.js';

const logger = createLogger('Main');

export function createGatewayContext(config: Readonly<GatewayConfig>): GatewayContext {
  return {
    policy: config,
    buildTool: new BuildToolRunner({ executable: config.cliPath, timeoutMs: config.cliTimeoutMs }),
    serial: new SerialTransceiver(),
    devices: new DeviceLister(),
  };
}

async function main(argv: string[] = process.argv.slice(2)) {
  const config = loadGatewayConfig();
  setLogLevel(config.logLevel);

  const transport = argv.includes('--mcp') ? 'mcp' : config.transport;
  const registry = createMethodRegistry();
  const context = createGatewayContext(config);

  logger.info('Starting sketch gateway', {
    transport,
    sketchRoot: config.sketchRoot,
    cli: config.cliPath,
    cliTimeoutMs: config.cliTimeoutMs,
  });
  if (config.allowAnySketchPath) {
    logger.warn('SKETCH_GATEWAY_ALLOW_ANY_PATH is set: sketches outside the sketch root are accepted');
  }

  if (transport === 'mcp') {
    const server = createMcpServer(registry, context);
    await server.connect(new StdioServerTransport());
    return;
  }

  const dispatcher = new RequestDispatcher(registry, context);
  await dispatcher.serve(process.stdin, process.stdout);
}

if (!process.env.SKETCH_GATEWAY_SKIP_MAIN) {
  main().catch((error) => {
    logger.error('Fatal error', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  });
}
