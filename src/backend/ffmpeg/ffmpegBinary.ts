import { execFileSync } from 'child_process';
import fs from 'node:fs';

export type FfmpegSource = 'configured' | 'system' | 'fallback';

export interface ResolvedFfmpeg {
  path: string;
  source: FfmpegSource;
}

interface ResolveFfmpegOptions {
  configuredPath?: string;
  fileExists?: (filePath: string) => boolean;
  detectSystem?: (binary: string) => string | null;
}

/** `ffmpeg version 6.1.1 ...` -> `6.1.1` */
export const parseFfmpegVersion = (output: string): string | null =>
  output.match(/ffmpeg version (\S+)/)?.[1] ?? null;

/**
 * Run `<binary> -version` from PATH. Answers the command when it runs,
 * null when it does not.
 */
export const detectSystemBinary = (binary: string): string | null => {
  try {
    const output = execFileSync(binary, ['-version'], {
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'ignore'],
    });
    const version = parseFfmpegVersion(output);
    console.log(
      version
        ? `ℹ️  FFmpeg version ${version} on PATH`
        : 'ℹ️  (Could not detect version, but FFmpeg runs)',
    );
    return binary;
  } catch (error) {
    console.log(
      '⚠️ System FFmpeg did not run:',
      error instanceof Error ? error.message : error,
    );
    return null;
  }
};

/**
 * Resolve the ffmpeg executable.
 *
 * Order: a configured path that exists, then the system ffmpeg when
 * `ffmpeg -version` runs, then the bare `ffmpeg` command (extractions will then fail with a
 * spawn error that is reported per clip).
 */
export function resolveFfmpegPath(
  options: ResolveFfmpegOptions = {},
): ResolvedFfmpeg {
  const {
    configuredPath,
    fileExists = fs.existsSync,
    detectSystem = detectSystemBinary,
  } = options;

  console.log('🔍 Initializing FFmpeg path...');

  if (configuredPath) {
    if (fileExists(configuredPath)) {
      console.log('✅ Using configured FFmpeg:', configuredPath);
      return { path: configuredPath, source: 'configured' };
    }
    console.log('⚠️ Configured FFmpeg not found:', configuredPath);
  }

  console.log('🔄 Attempting system FFmpeg...');
  const systemPath = detectSystem('ffmpeg');
  if (systemPath) {
    console.log('✅ Using system FFmpeg:', systemPath);
    return { path: systemPath, source: 'system' };
  }

  console.error('❌ FFmpeg not found on this machine');
  console.error('📋 Install FFmpeg system-wide or set INOUT_FFMPEG_PATH');
  return { path: 'ffmpeg', source: 'fallback' };
}
