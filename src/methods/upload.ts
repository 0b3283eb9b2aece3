/**
 * upload: flash a sketch to a board via arduino-cli upload
 */

import { validateFqbn, validatePort, validateSketchPath } from '../validation/validator.js';
import { createLogger } from '../utils/logger.js';
import type { BuildResult } from '../types.js';
import { toBuildResult } from './build-result.js';
import { defineMethod, type GatewayContext } from './context.js';
import { uploadSchema, type UploadParams } from './schemas.js';

const logger = createLogger('Upload');

export async function runUpload(params: UploadParams, context: GatewayContext): Promise<BuildResult> {
  const sketch = validateSketchPath(params.sketch, context.policy);
  const fqbn = validateFqbn(params.fqbn);
  const port = validatePort(params.port);

  logger.info('Starting upload', { sketch, port, fqbn });
  const outcome = await context.buildTool.upload(sketch, fqbn, port);
  logger.info('Upload finished', {
    outcome: outcome.kind,
    port,
    durationMs: outcome.durationMs,
  });

  return toBuildResult('Upload', outcome);
}

export const uploadMethod = defineMethod({
  name: 'upload',
  title: 'Upload Sketch',
  description: 'Upload a sketch to the board on the given serial port',
  params: uploadSchema,
  handler: runUpload,
});
