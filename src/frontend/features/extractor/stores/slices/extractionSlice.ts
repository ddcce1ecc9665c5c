import { extractorApi } from '@/frontend/lib/extractorApi';
import type { IpcResponse } from '@/shared/ipc/channels';
import { validateRange } from '@/shared/time/timeSelection';
import type {
  ClipRequest,
  ExtractionOutcome,
  VideoEntry,
} from '@/shared/types/extractor.types';
import type { StateCreator } from 'zustand';
import type { ExtractorStore, ExtractorStoreMutators } from '../index';

export const EXTRACTION_BUSY_MESSAGE = 'Another extraction is already running';

export interface ExtractionState {
  isExtracting: boolean;
  // null while idle, or during a batch
  currentPath: string | null;
  lastOutcomes: Record<string, ExtractionOutcome>;
}

export interface ExtractionSlice {
  extraction: ExtractionState;
  extractEntry: (path: string) => Promise<ExtractionOutcome | null>;
  extractAll: () => Promise<ExtractionOutcome[]>;
  playEntry: (path: string) => Promise<IpcResponse<'player:play-file'>>;
}

const toClipRequest = (entry: VideoEntry): ClipRequest => ({
  path: entry.path,
  inSeconds: entry.inTime,
  outSeconds: entry.outTime,
});

const failedOutcome = (
  sourcePath: string,
  error: string,
  errorKind: 'busy' | 'unavailable' | 'invalid-range',
): ExtractionOutcome => ({ success: false, sourcePath, error, errorKind });

const indexOutcomes = (
  outcomes: ExtractionOutcome[],
): Record<string, ExtractionOutcome> =>
  Object.fromEntries(outcomes.map((outcome) => [outcome.sourcePath, outcome]));

export const createExtractionSlice: StateCreator<
  ExtractorStore,
  ExtractorStoreMutators,
  [],
  ExtractionSlice
> = (set, get) => {
  const startExtraction = (currentPath: string | null) =>
    set(
      (state) => ({
        extraction: { ...state.extraction, isExtracting: true, currentPath },
      }),
      false,
      'extraction/start',
    );

  const finishExtraction = (outcomes: ExtractionOutcome[]) =>
    set(
      (state) => ({
        extraction: {
          isExtracting: false,
          currentPath: null,
          lastOutcomes: {
            ...state.extraction.lastOutcomes,
            ...indexOutcomes(outcomes),
          },
        },
      }),
      false,
      'extraction/finish',
    );

  return {
    extraction: {
      isExtracting: false,
      currentPath: null,
      lastOutcomes: {},
    },

    extractEntry: async (path) => {
      const entry = get().getEntry(path);
      if (!entry) {
        console.warn(`⚠️ Cannot extract untracked file: ${path}`);
        return null;
      }

      if (get().extraction.isExtracting) {
        return failedOutcome(path, EXTRACTION_BUSY_MESSAGE, 'busy');
      }

      // Invalid ranges never leave the renderer
      const rangeError = validateRange(entry.inTime, entry.outTime);
      if (rangeError) {
        const outcome = failedOutcome(path, rangeError, 'invalid-range');
        finishExtraction([outcome]);
        return outcome;
      }

      startExtraction(path);
      console.log(
        `🎬 Extracting ${entry.name} [${entry.inTime}s → ${entry.outTime}s]`,
      );

      const response = await extractorApi.extractClip(toClipRequest(entry));
      const outcome = response.success
        ? response.outcome
        : failedOutcome(path, response.error, 'unavailable');

      finishExtraction([outcome]);
      return outcome;
    },

    extractAll: async () => {
      const entries = get().getEntries();
      if (entries.length === 0) return [];

      if (get().extraction.isExtracting) {
        return entries.map((entry) =>
          failedOutcome(entry.path, EXTRACTION_BUSY_MESSAGE, 'busy'),
        );
      }

      startExtraction(null);
      console.log(`🎬 Extracting ${entries.length} clip(s)`);

      const response = await extractorApi.extractAll(entries.map(toClipRequest));
      const outcomes = response.success
        ? response.outcomes
        : entries.map((entry) =>
            failedOutcome(entry.path, response.error, 'unavailable'),
          );

      finishExtraction(outcomes);
      return outcomes;
    },

    playEntry: async (path) => {
      const response = await extractorApi.playFile(path);
      if (!response.success) {
        console.error(`❌ Failed to play ${path}:`, response.error);
      }
      return response;
    },
  };
};
