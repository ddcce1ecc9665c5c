import { EventEmitter } from 'node:events';
import type {
  ProcessSpawner,
  SpawnedProcess,
} from '@/backend/ffmpeg/ffmpegRunner';

export type FakeProcessBehavior =
  | { exitCode: number; stdout?: string; stderr?: string }
  | { signal: NodeJS.Signals; stderr?: string }
  | { spawnError: string };

export interface SpawnCall {
  command: string;
  args: string[];
}

export interface FakeSpawner {
  spawn: ProcessSpawner;
  calls: SpawnCall[];
}

class FakeProcess extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
}

/**
 * Stand-in for child_process.spawn. Each call plays back the next behavior
 * (the last one repeats) once the runner has attached its listeners.
 */
export function createFakeSpawner(
  behaviors: FakeProcessBehavior[] = [{ exitCode: 0 }],
): FakeSpawner {
  const calls: SpawnCall[] = [];

  const spawn: ProcessSpawner = (command, args): SpawnedProcess => {
    const behavior: FakeProcessBehavior = behaviors[
      Math.min(calls.length, behaviors.length - 1)
    ] ?? { exitCode: 0 };
    calls.push({ command, args });

    const child = new FakeProcess();
    queueMicrotask(() => {
      if ('spawnError' in behavior) {
        child.emit('error', new Error(behavior.spawnError));
        child.emit('close', null, null);
        return;
      }
      if ('signal' in behavior) {
        if (behavior.stderr) child.stderr.emit('data', behavior.stderr);
        child.emit('close', null, behavior.signal);
        return;
      }
      if (behavior.stdout) child.stdout.emit('data', behavior.stdout);
      if (behavior.stderr) child.stderr.emit('data', behavior.stderr);
      child.emit('close', behavior.exitCode, null);
    });

    return child;
  };

  return { spawn, calls };
}
