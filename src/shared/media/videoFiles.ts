import type { TimeUnit } from '../types/extractor.types';

/** Extensions accepted by the file picker */
export const VIDEO_EXTENSIONS = ['mp4', 'avi', 'mkv'] as const;

export const DEFAULT_OUTPUT_DIR = './output';

export const CLIP_EXTENSION = 'mp4';

export const TIME_UNIT_MAX: Record<TimeUnit, number> = {
  hours: 23,
  minutes: 59,
  seconds: 59,
};

const getExtension = (filePath: string): string => {
  const fileName = getFileName(filePath);
  const dot = fileName.lastIndexOf('.');
  return dot > 0 ? fileName.slice(dot + 1).toLowerCase() : '';
};

/**
 * Last path segment, for either separator style (no node:path in the
 * renderer).
 */
export const getFileName = (filePath: string): string => {
  const segments = filePath.split(/[\\/]/);
  return segments[segments.length - 1] ?? filePath;
};

export const isVideoFile = (filePath: string): boolean => {
  const extension = getExtension(filePath);
  return VIDEO_EXTENSIONS.some((accepted) => accepted === extension);
};
