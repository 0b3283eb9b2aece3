/**
 * compile: arduino-cli compile for a validated sketch and board
 */

import { validateFqbn, validateSketchPath } from '../validation/validator.js';
import { createLogger } from '../utils/logger.js';
import type { BuildResult } from '../types.js';
import { toBuildResult } from './build-result.js';
import { defineMethod, type GatewayContext } from './context.js';
import { compileSchema, type CompileParams } from './schemas.js';

const logger = createLogger('Compile');

export async function runCompile(params: CompileParams, context: GatewayContext): Promise<BuildResult> {
  const sketch = validateSketchPath(params.sketch, context.policy);
  const fqbn = validateFqbn(params.fqbn);

  logger.info('Starting compilation', { sketch, fqbn });
  const outcome = await context.buildTool.compile(sketch, fqbn);
  logger.info('Compilation finished', {
    outcome: outcome.kind,
    exitCode: outcome.kind === 'completed' ? outcome.exitCode : undefined,
    durationMs: outcome.durationMs,
  });

  return toBuildResult('Compile', outcome);
}

export const compileMethod = defineMethod({
  name: 'compile',
  title: 'Compile Sketch',
  description: 'Compile a sketch with arduino-cli for the given board',
  params: compileSchema,
  handler: runCompile,
});
