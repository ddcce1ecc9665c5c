/**
 * Builds the FFmpeg job for cutting one clip out of a source video.
 *
 * The clip is a stream copy: no re-encode, so cut points snap to the
 * nearest keyframe of the source.
 */
import { format } from 'date-fns';
import path from 'node:path';
import { CLIP_EXTENSION } from '../../shared/media/videoFiles';
import type { ExtractionJob } from '../../shared/types/extractor.types';

export const CLIP_TIMESTAMP_FORMAT = 'yyyyMMdd_HHmmss';

/**
 * `<original basename>_clip_<YYYYMMDD_HHMMSS>.mp4`. The basename keeps its
 * own extension.
 *
 * @example
 * buildClipFilename('/videos/clip.mp4', new Date(2025, 1, 27, 16, 10, 0))
 * // "clip.mp4_clip_20250227_161000.mp4"
 */
export function buildClipFilename(sourcePath: string, createdAt: Date): string {
  const baseName = path.basename(sourcePath);
  const timestamp = format(createdAt, CLIP_TIMESTAMP_FORMAT);
  return `${baseName}_clip_${timestamp}.${CLIP_EXTENSION}`;
}

export function createExtractionJob(
  sourcePath: string,
  startSeconds: number,
  endSeconds: number,
  outputDir: string,
  createdAt: Date,
): ExtractionJob {
  return {
    sourcePath,
    startSeconds,
    endSeconds,
    outputPath: path.join(outputDir, buildClipFilename(sourcePath, createdAt)),
  };
}

/**
 * Arguments for `ffmpeg -i <input> -ss <start> -to <end> -c copy <output>`.
 */
export function buildClipArgs(job: ExtractionJob): string[] {
  return [
    '-i',
    job.sourcePath,
    '-ss',
    String(job.startSeconds),
    '-to',
    String(job.endSeconds),
    '-c',
    'copy',
    job.outputPath,
  ];
}
