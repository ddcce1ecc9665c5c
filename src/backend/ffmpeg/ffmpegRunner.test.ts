import { createFakeSpawner } from '@/test/helpers/createFakeSpawner';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FfmpegRunner, tailLines } from './ffmpegRunner';

describe('FfmpegRunner', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should spawn the configured binary with the given arguments', async () => {
    const fake = createFakeSpawner();
    const runner = new FfmpegRunner('/usr/bin/ffmpeg', fake.spawn);

    await runner.run(['-i', 'in.mp4', 'out.mp4']);

    expect(fake.calls).toEqual([
      { command: '/usr/bin/ffmpeg', args: ['-i', 'in.mp4', 'out.mp4'] },
    ]);
  });

  it('should resolve with the exit code and collected output', async () => {
    const fake = createFakeSpawner([
      { exitCode: 1, stdout: 'frame=1', stderr: 'No such file' },
    ]);
    const runner = new FfmpegRunner('ffmpeg', fake.spawn);

    const result = await runner.run(['-i', 'missing.mp4']);

    expect(result).toEqual({
      exitCode: 1,
      stdout: 'frame=1',
      stderr: 'No such file',
    });
  });

  it('should forward output to the log callback', async () => {
    const fake = createFakeSpawner([{ exitCode: 0, stderr: 'size=10kB' }]);
    const runner = new FfmpegRunner('ffmpeg', fake.spawn);
    const onLog = vi.fn();

    await runner.run([], { onLog });

    expect(onLog).toHaveBeenCalledWith('size=10kB', 'stderr');
  });

  it('should report the signal when the process is killed', async () => {
    const fake = createFakeSpawner([{ signal: 'SIGKILL', stderr: 'frame=12' }]);
    const runner = new FfmpegRunner('ffmpeg', fake.spawn);

    const result = await runner.run(['-i', 'in.mp4']);

    expect(result).toEqual({
      exitCode: null,
      signal: 'SIGKILL',
      stdout: '',
      stderr: 'frame=12',
    });
  });

  it('should report a spawn failure once', async () => {
    const fake = createFakeSpawner([{ spawnError: 'spawn ffmpeg ENOENT' }]);
    const runner = new FfmpegRunner('ffmpeg', fake.spawn);

    const result = await runner.run(['-version']);

    expect(result).toEqual({
      exitCode: null,
      stdout: '',
      stderr: '',
      spawnError: 'spawn ffmpeg ENOENT',
    });
  });

  it('should report a spawner that throws', async () => {
    const runner = new FfmpegRunner('ffmpeg', () => {
      throw new Error('EACCES');
    });

    const result = await runner.run([]);

    expect(result.spawnError).toBe('EACCES');
    expect(result.exitCode).toBeNull();
  });
});

describe('tailLines', () => {
  it('should keep the last non-empty lines', () => {
    expect(tailLines('a\n\nb\r\nc\n', 2)).toBe('b\nc');
  });

  it('should return an empty string for empty output', () => {
    expect(tailLines('')).toBe('');
  });
});
