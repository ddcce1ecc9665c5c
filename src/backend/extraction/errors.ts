import type {
  ExtractionErrorKind,
  ExtractionOutcome,
} from '../../shared/types/extractor.types';

export abstract class ExtractionError extends Error {
  abstract readonly kind: ExtractionErrorKind;

  constructor(
    message: string,
    readonly sourcePath: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toOutcome(): ExtractionOutcome {
    return {
      success: false,
      sourcePath: this.sourcePath,
      error: this.message,
      errorKind: this.kind,
    };
  }
}

/** The requested out point is not after the in point */
export class InvalidRangeError extends ExtractionError {
  readonly kind = 'invalid-range';

  constructor(
    sourcePath: string,
    readonly inSeconds: number,
    readonly outSeconds: number,
    message: string,
  ) {
    super(message, sourcePath);
  }
}

/** How an ffmpeg run went wrong */
export type ToolFailure =
  | { reason: 'spawn'; details: string }
  | { reason: 'exit'; exitCode: number; details: string }
  | { reason: 'signal'; signal: string; details: string };

const withDetails = (message: string, details: string) =>
  details ? `${message}: ${details}` : message;

const describeFailure = (failure: ToolFailure): string => {
  switch (failure.reason) {
    case 'spawn':
      return withDetails('FFmpeg could not be started', failure.details);
    case 'exit':
      return withDetails(
        `FFmpeg failed with exit code ${failure.exitCode}`,
        failure.details,
      );
    case 'signal':
      return withDetails(
        `FFmpeg was terminated by ${failure.signal}`,
        failure.details,
      );
  }
};

/** ffmpeg could not be started, exited non-zero or was killed */
export class ExternalToolError extends ExtractionError {
  readonly kind = 'external-tool';
  readonly exitCode: number | null;

  constructor(
    sourcePath: string,
    readonly failure: ToolFailure,
  ) {
    super(describeFailure(failure), sourcePath);
    this.exitCode = failure.reason === 'exit' ? failure.exitCode : null;
  }

  override toOutcome(): ExtractionOutcome {
    return {
      success: false,
      sourcePath: this.sourcePath,
      error: this.message,
      errorKind: this.kind,
      exitCode: this.exitCode,
    };
  }
}

/** Another extraction is still running */
export class ExtractionBusyError extends ExtractionError {
  readonly kind = 'busy';

  constructor(sourcePath: string) {
    super('Another extraction is already running', sourcePath);
  }
}
