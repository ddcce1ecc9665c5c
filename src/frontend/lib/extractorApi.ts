import type { ClipRequest } from '@/shared/types/extractor.types';
import { invoke } from './ipcClient';

// Typed facade over the IPC channels, one method per backend operation
export const extractorApi = {
  getConfig: () => invoke('app:get-config', {}),

  listDirectory: (directory?: string) =>
    invoke('fs:list-directory', directory ? { directory } : {}),

  extractClip: (request: ClipRequest) =>
    invoke('extractor:extract-clip', request),

  extractAll: (requests: ClipRequest[]) =>
    invoke('extractor:extract-all', { requests }),

  playFile: (path: string) => invoke('player:play-file', { path }),
};

export type ExtractorApi = typeof extractorApi;
