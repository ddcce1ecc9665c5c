import type { AppConfig } from '../config/appConfig';
import { toPublicConfig } from '../config/appConfig';
import type { ExtractionService } from '../extraction/extractionService';
import { listMediaDirectory } from '../io/mediaBrowser';
import type { PlaybackLauncher } from '../playback/playbackLauncher';
import type { IpcRouter } from './ipcRouter';

export interface BackendServices {
  config: AppConfig;
  extraction: ExtractionService;
  playback: PlaybackLauncher;
}

export function registerIpcHandlers(
  router: IpcRouter,
  { config, extraction, playback }: BackendServices,
): void {
  router.handle('app:get-config', () => ({
    success: true,
    config: toPublicConfig(config),
  }));

  // Stands in for the native open dialog
  router.handle('fs:list-directory', async ({ directory }) => {
    try {
      const listing = await listMediaDirectory(directory);
      return { success: true, ...listing };
    } catch (error) {
      console.error('❌ Failed to list directory:', error);
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  });

  router.handle('extractor:extract-clip', async (request) => {
    console.log('🎯 extract-clip requested:', request);
    const outcome = await extraction.extract(request);
    return { success: true, outcome };
  });

  router.handle('extractor:extract-all', async ({ requests }) => {
    console.log(`🎯 extract-all requested for ${requests.length} clip(s)`);
    const outcomes = await extraction.extractAll(requests);
    return { success: true, outcomes };
  });

  router.handle('player:play-file', ({ path }) => {
    playback.play(path);
    return { success: true };
  });
}
