import { create } from 'zustand';
import { devtools } from 'zustand/middleware';
import {
  createExtractionSlice,
  type ExtractionSlice,
} from './slices/extractionSlice';
import {
  createQuickInsertSlice,
  type QuickInsertSlice,
} from './slices/quickInsertSlice';
import { createSessionSlice, type SessionSlice } from './slices/sessionSlice';

// Compose all slices into the complete store type
export type ExtractorStore = SessionSlice & QuickInsertSlice & ExtractionSlice;

export type ExtractorStoreMutators = [['zustand/devtools', never]];

export const useExtractorStore = create<ExtractorStore>()(
  devtools(
    (...a) => ({
      ...createSessionSlice(...a),
      ...createQuickInsertSlice(...a),
      ...createExtractionSlice(...a),
    }),
    {
      name: 'ExtractorStore',
      enabled: import.meta.env.DEV,
    },
  ),
);

export { getPointSeconds } from './slices/sessionSlice';
