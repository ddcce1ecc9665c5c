/**
 * Backend configuration, read once from the environment at startup.
 */
import path from 'node:path';
import { z } from 'zod';
import {
  DEFAULT_OUTPUT_DIR,
  VIDEO_EXTENSIONS,
} from '../../shared/media/videoFiles';
import type { PublicAppConfig } from '../../shared/types/extractor.types';
import { resolveFfmpegPath } from '../ffmpeg/ffmpegBinary';

const DEFAULT_PORT = 3001;

const EnvSchema = z.object({
  INOUT_FFMPEG_PATH: z.string().trim().min(1).optional(),
  INOUT_OUTPUT_DIR: z.string().trim().min(1).default(DEFAULT_OUTPUT_DIR),
  INOUT_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  INOUT_HOST: z.string().trim().min(1).default('localhost'),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export interface AppConfig {
  ffmpegPath: string;
  outputDir: string;
  port: number;
  host: string;
  rendererDir: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate the raw environment. Blank values count as unset.
 */
export function parseEnv(env: NodeJS.ProcessEnv): AppEnv {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => key.startsWith('INOUT_') && value?.trim(),
    ),
  );

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

export function loadAppConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = parseEnv(env);
  const ffmpeg = resolveFfmpegPath({ configuredPath: parsed.INOUT_FFMPEG_PATH });

  return {
    ffmpegPath: ffmpeg.path,
    outputDir: parsed.INOUT_OUTPUT_DIR,
    port: parsed.INOUT_PORT,
    host: parsed.INOUT_HOST,
    rendererDir: path.resolve(cwd, 'dist', 'renderer'),
  };
}

export const toPublicConfig = (config: AppConfig): PublicAppConfig => ({
  outputDir: config.outputDir,
  ffmpegPath: config.ffmpegPath,
  videoExtensions: VIDEO_EXTENSIONS,
});
