import { getFileName } from '@/shared/media/videoFiles';
import {
  coerceSeconds,
  parseTimeComponent,
  withTimeComponent,
} from '@/shared/time/timeSelection';
import type {
  TimePoint,
  TimeUnit,
  VideoEntry,
} from '@/shared/types/extractor.types';
import type { StateCreator } from 'zustand';
import type { ExtractorStore, ExtractorStoreMutators } from '../index';

/** Tracked files and their in/out selections, keyed by path */
export interface SessionSlice {
  entriesByPath: Record<string, VideoEntry>;
  entryOrder: string[];
  addFile: (path: string) => boolean;
  addFiles: (paths: string[]) => number;
  setInTime: (path: string, seconds: number) => void;
  setOutTime: (path: string, seconds: number) => void;
  setTimeComponent: (
    path: string,
    point: TimePoint,
    unit: TimeUnit,
    raw: string | number,
  ) => void;
  getEntry: (path: string) => VideoEntry | undefined;
  getEntries: () => VideoEntry[];
}

export const getPointSeconds = (entry: VideoEntry, point: TimePoint): number =>
  point === 'in' ? entry.inTime : entry.outTime;

const withPointSeconds = (
  entry: VideoEntry,
  point: TimePoint,
  seconds: number,
): VideoEntry =>
  point === 'in'
    ? { ...entry, inTime: seconds }
    : { ...entry, outTime: seconds };

export const createSessionSlice: StateCreator<
  ExtractorStore,
  ExtractorStoreMutators,
  [],
  SessionSlice
> = (set, get) => {
  const updatePoint = (path: string, point: TimePoint, seconds: number) => {
    const entry = get().entriesByPath[path];
    if (!entry) {
      console.warn(`⚠️ Ignoring time change for untracked file: ${path}`);
      return;
    }
    set(
      (state) => ({
        entriesByPath: {
          ...state.entriesByPath,
          [path]: withPointSeconds(entry, point, seconds),
        },
      }),
      false,
      `session/set-${point}-time`,
    );
  };

  return {
    entriesByPath: {},
    entryOrder: [],

    addFile: (path) => {
      if (get().entriesByPath[path]) {
        return false;
      }

      const entry: VideoEntry = {
        path,
        name: getFileName(path),
        inTime: 0,
        outTime: 0,
      };
      set(
        (state) => ({
          entriesByPath: { ...state.entriesByPath, [path]: entry },
          entryOrder: [...state.entryOrder, path],
        }),
        false,
        'session/add-file',
      );
      return true;
    },

    addFiles: (paths) =>
      paths.reduce((added, path) => (get().addFile(path) ? added + 1 : added), 0),

    setInTime: (path, seconds) => updatePoint(path, 'in', coerceSeconds(seconds)),

    setOutTime: (path, seconds) =>
      updatePoint(path, 'out', coerceSeconds(seconds)),

    setTimeComponent: (path, point, unit, raw) => {
      const entry = get().entriesByPath[path];
      if (!entry) return;

      const value = parseTimeComponent(raw, unit);
      updatePoint(
        path,
        point,
        withTimeComponent(getPointSeconds(entry, point), unit, value),
      );
    },

    getEntry: (path) => get().entriesByPath[path],

    getEntries: () => {
      const { entriesByPath, entryOrder } = get();
      return entryOrder.flatMap((path) => {
        const entry = entriesByPath[path];
        return entry ? [entry] : [];
      });
    },
  };
};
