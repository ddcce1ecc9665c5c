import type { ActiveField } from '@/shared/types/extractor.types';
import type { StateCreator } from 'zustand';
import type { ExtractorStore, ExtractorStoreMutators } from '../index';

export interface QuickInsertSlice {
  activeField: ActiveField | null;
  setActiveField: (field: ActiveField | null) => void;
  quickInsert: (value: number) => void;
}

export const createQuickInsertSlice: StateCreator<
  ExtractorStore,
  ExtractorStoreMutators,
  [],
  QuickInsertSlice
> = (set, get) => ({
  activeField: null,

  setActiveField: (field) =>
    set({ activeField: field }, false, 'quick-insert/set-active-field'),

  // Writes into the last focused selector; out-of-range values land as 0
  quickInsert: (value) => {
    const { activeField, setTimeComponent } = get();
    if (!activeField) return;

    setTimeComponent(activeField.path, activeField.point, activeField.unit, value);
  },
});
