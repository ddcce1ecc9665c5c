/**
 * Extraction Service
 * Validates in/out ranges and cuts clips with FFmpeg, one at a time.
 */
import fs from 'node:fs';
import path from 'node:path';
import { validateRange } from '../../shared/time/timeSelection';
import type {
  ClipRequest,
  ExtractionOutcome,
} from '../../shared/types/extractor.types';
import {
  buildClipArgs,
  createExtractionJob,
} from '../ffmpeg/clipCommandBuilder';
import { FfmpegRunner, tailLines } from '../ffmpeg/ffmpegRunner';
import {
  ExtractionBusyError,
  ExternalToolError,
  InvalidRangeError,
} from './errors';

export interface ExtractionServiceOptions {
  runner: FfmpegRunner;
  outputDir: string;
  now?: () => Date;
}

export class ExtractionService {
  private readonly runner: FfmpegRunner;
  private readonly outputDir: string;
  private readonly now: () => Date;
  private isRunning = false;

  constructor(options: ExtractionServiceOptions) {
    this.runner = options.runner;
    this.outputDir = options.outputDir;
    this.now = options.now ?? (() => new Date());
  }

  get busy(): boolean {
    return this.isRunning;
  }

  /**
   * Create the output directory if it does not exist yet.
   */
  async ensureOutputDirectory(): Promise<string> {
    const absoluteOutputDir = path.resolve(this.outputDir);
    if (!fs.existsSync(absoluteOutputDir)) {
      await fs.promises.mkdir(absoluteOutputDir, { recursive: true });
      console.log('📁 Created output directory:', absoluteOutputDir);
    }
    return absoluteOutputDir;
  }

  /**
   * Cut one clip. An invalid range is rejected before ffmpeg is started.
   */
  async extract(request: ClipRequest): Promise<ExtractionOutcome> {
    if (this.isRunning) {
      console.warn('⚠️ Extraction requested while another is running');
      return new ExtractionBusyError(request.path).toOutcome();
    }

    this.isRunning = true;
    try {
      return await this.runExtraction(request);
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * Cut every requested clip in order. A failed clip does not stop the
   * batch; there is one outcome per request.
   */
  async extractAll(requests: ClipRequest[]): Promise<ExtractionOutcome[]> {
    if (this.isRunning) {
      console.warn('⚠️ Batch extraction requested while another is running');
      return requests.map((request) =>
        new ExtractionBusyError(request.path).toOutcome(),
      );
    }

    console.log(`📦 Extracting ${requests.length} clip(s)`);
    this.isRunning = true;
    try {
      const outcomes: ExtractionOutcome[] = [];
      for (const request of requests) {
        outcomes.push(await this.runExtraction(request));
      }

      const succeeded = outcomes.filter((outcome) => outcome.success).length;
      console.log(
        `📊 Batch finished: ${succeeded} succeeded, ${outcomes.length - succeeded} failed`,
      );
      return outcomes;
    } finally {
      this.isRunning = false;
    }
  }

  private async runExtraction({
    path: sourcePath,
    inSeconds,
    outSeconds,
  }: ClipRequest): Promise<ExtractionOutcome> {
    const rangeError = validateRange(inSeconds, outSeconds);
    if (rangeError) {
      console.warn(
        `⚠️ Skipping ${sourcePath}: in=${inSeconds}s out=${outSeconds}s`,
      );
      return new InvalidRangeError(
        sourcePath,
        inSeconds,
        outSeconds,
        rangeError,
      ).toOutcome();
    }

    await this.ensureOutputDirectory();

    const job = createExtractionJob(
      sourcePath,
      inSeconds,
      outSeconds,
      this.outputDir,
      this.now(),
    );
    console.log('✂️ Extracting clip:', job);

    const result = await this.runner.run(buildClipArgs(job));

    if (result.spawnError !== undefined) {
      return new ExternalToolError(sourcePath, {
        reason: 'spawn',
        details: result.spawnError,
      }).toOutcome();
    }

    if (result.signal) {
      console.error(`❌ FFmpeg was terminated by ${result.signal}`);
      return new ExternalToolError(sourcePath, {
        reason: 'signal',
        signal: result.signal,
        details: tailLines(result.stderr),
      }).toOutcome();
    }

    if (result.exitCode !== 0) {
      console.error(`❌ FFmpeg failed with exit code: ${result.exitCode}`);
      return new ExternalToolError(sourcePath, {
        reason: 'exit',
        // close reports null only together with a signal
        exitCode: result.exitCode ?? -1,
        details: tailLines(result.stderr),
      }).toOutcome();
    }

    console.log('✅ Clip written:', job.outputPath);
    return { success: true, sourcePath, outputPath: job.outputPath };
  }
}
