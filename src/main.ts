import { ConfigError, loadAppConfig } from './backend/config/appConfig';
import { ExtractionService } from './backend/extraction/extractionService';
import { FfmpegRunner } from './backend/ffmpeg/ffmpegRunner';
import { IpcRouter } from './backend/ipc/ipcRouter';
import { createIpcServer } from './backend/ipc/ipcServer';
import { registerIpcHandlers } from './backend/ipc/registerHandlers';
import { PlaybackLauncher } from './backend/playback/playbackLauncher';

async function start(): Promise<void> {
  console.log('🚀 Starting In-Out Extractor...');
  console.log('🌍 Environment:', process.env.NODE_ENV || 'production');

  const config = loadAppConfig();
  const extraction = new ExtractionService({
    runner: new FfmpegRunner(config.ffmpegPath),
    outputDir: config.outputDir,
  });
  const outputDir = await extraction.ensureOutputDirectory();

  const router = new IpcRouter();
  registerIpcHandlers(router, {
    config,
    extraction,
    playback: new PlaybackLauncher(),
  });

  const server = createIpcServer({ router, rendererDir: config.rendererDir });

  server.on('error', (error) => {
    console.error('❌ Server error:', error);
    process.exitCode = 1;
  });

  server.listen(config.port, config.host, () => {
    console.log(`📡 Extractor ready on http://${config.host}:${config.port}`);
    console.log('📂 Clips are written to:', outputDir);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`🛑 Received ${signal}, shutting down`);
    server.close();
    server.closeAllConnections();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

start().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error('❌ Failed to start:', error);
  }
  process.exitCode = 1;
});
