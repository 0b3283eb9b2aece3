/**
 * Build Tool Runner
 * Runs arduino-cli with a fixed argument vector, never through a shell
 */

import { execa } from 'execa';
import type { CommandLine, ProcessOutcome } from '../types.js';
import type { Fqbn, SerialPortPath, SketchPath } from '../validation/validator.js';
import { createLogger } from './logger.js';

const logger = createLogger('CLIRunner');

export const DEFAULT_TIMEOUT_MS = 60_000;
const FORCE_KILL_AFTER_MS = 2_000;

export interface BuildToolRunnerOptions {
  executable?: string;
  timeoutMs?: number;
}

function describeFailure(result: object): string {
  if ('shortMessage' in result && typeof result.shortMessage === 'string') {
    return result.shortMessage;
  }
  return 'process failed to start';
}

/**
 * Stateless wrapper around the build tool. Concurrent calls share nothing.
 */
export class BuildToolRunner {
  readonly executable: string;
  readonly timeoutMs: number;

  constructor(options: BuildToolRunnerOptions = {}) {
    this.executable = options.executable ?? 'arduino-cli';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  compile(sketch: SketchPath, fqbn: Fqbn): Promise<ProcessOutcome> {
    return this.run(['compile', '--fqbn', fqbn, sketch]);
  }

  upload(sketch: SketchPath, fqbn: Fqbn, port: SerialPortPath): Promise<ProcessOutcome> {
    return this.run(['upload', '-p', port, '--fqbn', fqbn, sketch]);
  }

  /**
   * Run the executable and classify how it ended.
   * Every terminal state is returned; nothing is thrown. A timed-out
   * child has exited by the time its outcome is returned.
   */
  async run(args: readonly string[], options: { timeoutMs?: number } = {}): Promise<ProcessOutcome> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const command: CommandLine = { executable: this.executable, args: [...args] };
    logger.debug('Running build tool', command);

    const started = Date.now();
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    try {
      const subprocess = execa(this.executable, command.args, {
        shell: false,
        reject: false,
        stdin: 'ignore',
      });
      // SIGTERM first, SIGKILL after the grace period; the await below lasts until the child has exited
      timer = setTimeout(() => {
        timedOut = true;
        subprocess.kill('SIGTERM', { forceKillAfterTimeout: FORCE_KILL_AFTER_MS });
      }, timeoutMs);
      const result = await subprocess;
      const durationMs = Date.now() - started;

      if (timedOut) {
        logger.warn('Build tool timed out', { args: command.args, timeoutMs });
        return {
          kind: 'timed_out',
          timeoutMs,
          stdout: result.stdout,
          stderr: result.stderr,
          command,
          durationMs,
        };
      }

      // execa leaves exitCode unset when the process never started or died from a signal
      if (typeof result.exitCode !== 'number') {
        const reason = result.signal
          ? `terminated by ${result.signal}`
          : describeFailure(result);
        logger.error('Build tool did not run to completion', { args: command.args, reason });
        return { kind: 'spawn_failed', reason, command, durationMs };
      }

      logger.debug('Build tool finished', { exitCode: result.exitCode, durationMs });
      return {
        kind: 'completed',
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
        command,
        durationMs,
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error('Build tool execution failed', { error: reason, args: command.args });
      return { kind: 'spawn_failed', reason, command, durationMs: Date.now() - started };
    } finally {
      clearTimeout(timer);
    }
  }
}
