/**
 * FFmpeg process runner for the backend.
 * Spawns one ffmpeg process, streams its output to the log and resolves once
 * it exits. No timeout is applied: a hung ffmpeg keeps the run pending.
 */
import { spawn } from 'child_process';

interface OutputStream {
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
}

/** The part of a child process the runner relies on */
export interface SpawnedProcess {
  stdout: OutputStream | null;
  stderr: OutputStream | null;
  on(
    event: 'close',
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type ProcessSpawner = (
  command: string,
  args: string[],
) => SpawnedProcess;

export interface FfmpegCallbacks {
  onLog?: (log: string, type: 'stdout' | 'stderr') => void;
}

export interface FfmpegRunResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be started at all */
  spawnError?: string;
  /** Set when the process was killed instead of exiting */
  signal?: NodeJS.Signals;
}

// stdin is closed so an overwrite prompt answers "no" instead of blocking
export const spawnFfmpegProcess: ProcessSpawner = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export class FfmpegRunner {
  constructor(
    private readonly ffmpegPath: string,
    private readonly spawnProcess: ProcessSpawner = spawnFfmpegProcess,
  ) {}

  get binaryPath(): string {
    return this.ffmpegPath;
  }

  run(args: string[], callbacks?: FfmpegCallbacks): Promise<FfmpegRunResult> {
    console.log('🎬 FFMPEG COMMAND:');
    console.log([this.ffmpegPath, ...args].join(' '));

    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (result: FfmpegRunResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      let ffmpeg: SpawnedProcess;
      try {
        ffmpeg = this.spawnProcess(this.ffmpegPath, args);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error('❌ FFmpeg spawn error:', message);
        finish({ exitCode: null, stdout, stderr, spawnError: message });
        return;
      }

      ffmpeg.stdout?.on('data', (data) => {
        const text = data.toString();
        stdout += text;
        console.log(`[FFmpeg stdout] ${text.trim()}`);
        callbacks?.onLog?.(text, 'stdout');
      });

      ffmpeg.stderr?.on('data', (data) => {
        const text = data.toString();
        stderr += text;
        console.log(`[FFmpeg stderr] ${text.trim()}`);
        callbacks?.onLog?.(text, 'stderr');
      });

      ffmpeg.on('close', (code, signal) => {
        if (signal) {
          console.log(`🎬 FFmpeg process terminated by signal: ${signal}`);
          finish({ exitCode: code, signal, stdout, stderr });
          return;
        }
        console.log(`🎬 FFmpeg process exited with code: ${code}`);
        finish({ exitCode: code, stdout, stderr });
      });

      ffmpeg.on('error', (error) => {
        console.error('❌ FFmpeg spawn error:', error);
        finish({ exitCode: null, stdout, stderr, spawnError: error.message });
      });
    });
  }
}

/** Last non-empty lines of ffmpeg's stderr, where it prints the reason */
export function tailLines(output: string, count = 5): string {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(-count)
    .join('\n');
}
