export type TimePoint = 'in' | 'out';

export type TimeUnit = 'hours' | 'minutes' | 'seconds';

export interface TimeParts {
  hours: number; // 0-23
  minutes: number; // 0-59
  seconds: number; // 0-59
}

/** A tracked file and its current in/out selection, in whole seconds */
export interface VideoEntry {
  path: string;
  name: string;
  inTime: number;
  outTime: number;
}

/** The time field quick-insert writes into */
export interface ActiveField {
  path: string;
  point: TimePoint;
  unit: TimeUnit;
}

export interface ClipRequest {
  path: string;
  inSeconds: number;
  outSeconds: number;
}

export interface ExtractionJob {
  sourcePath: string;
  startSeconds: number;
  endSeconds: number;
  outputPath: string;
}

export type ExtractionErrorKind =
  | 'invalid-range'
  | 'external-tool'
  | 'busy'
  // the renderer could not reach the backend
  | 'unavailable';

export type ExtractionOutcome =
  | {
      success: true;
      sourcePath: string;
      outputPath: string;
    }
  | {
      success: false;
      sourcePath: string;
      error: string;
      errorKind: ExtractionErrorKind;
      exitCode?: number | null;
    };

export interface DirectoryEntry {
  name: string;
  path: string;
  kind: 'directory' | 'video';
}

export interface DirectoryListing {
  directory: string;
  parent: string | null;
  entries: DirectoryEntry[];
}

export interface PublicAppConfig {
  outputDir: string;
  ffmpegPath: string;
  videoExtensions: readonly string[];
}
