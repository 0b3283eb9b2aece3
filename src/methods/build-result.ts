/**
 * Maps a build tool outcome onto the compile/upload payload
 */

import type { BuildResult, ProcessOutcome } from '../types.js';

export function toBuildResult(stage: 'Compile' | 'Upload', outcome: ProcessOutcome): BuildResult {
  switch (outcome.kind) {
    case 'completed':
      return {
        success: outcome.exitCode === 0,
        exitCode: outcome.exitCode,
        stdout: outcome.stdout,
        stderr: outcome.stderr,
      };
    case 'timed_out':
      return {
        success: false,
        error: `${stage} timed out after ${outcome.timeoutMs / 1000}s`,
        timedOut: true,
      };
    case 'spawn_failed':
      return { success: false, error: `${stage} failed: ${outcome.reason}` };
  }
}
