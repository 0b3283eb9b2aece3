/**
 * Shared type definitions for the sketch gateway
 */

// Normalized serial device entry returned by list_ports
export interface DeviceDescriptor {
  device: string;
  description: string;
  hwid: string;
}

export interface CommandLine {
  executable: string;
  args: string[];
}

// Terminal states of one build tool invocation
export type ProcessOutcome =
  | {
      kind: 'completed';
      exitCode: number;
      stdout: string;
      stderr: string;
      command: CommandLine;
      durationMs: number;
    }
  | {
      kind: 'timed_out';
      timeoutMs: number;
      stdout: string;
      stderr: string;
      command: CommandLine;
      durationMs: number;
    }
  | {
      kind: 'spawn_failed';
      reason: string;
      command: CommandLine;
      durationMs: number;
    };

// Payload of compile / upload
export type BuildResult =
  | { success: boolean; exitCode: number; stdout: string; stderr: string }
  | { success: false; error: string; timedOut?: true };

export type ReadStopReason = 'count' | 'timeout';

export interface LineReadResult {
  lines: string[];
  stoppedBy: ReadStopReason;
  elapsedSeconds: number;
}

// Payload of serial_send
export type SerialSendResult =
  | { success: true; response: string }
  | { success: false; error: string };

// Payload of read_serial
export type SerialReadResult =
  | ({ success: true } & LineReadResult)
  | { success: false; error: string };
