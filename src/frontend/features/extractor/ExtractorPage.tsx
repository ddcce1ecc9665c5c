import { Button } from '@/frontend/components/ui/button';
import { extractorApi } from '@/frontend/lib/extractorApi';
import type { PublicAppConfig } from '@/shared/types/extractor.types';
import { Film, FolderPlus, Scissors } from 'lucide-react';
import React, { useEffect, useState } from 'react';
import { toast } from 'sonner';
import { AddVideosDialog } from './components/addVideosDialog';
import { QuickInsertBar } from './components/quickInsertBar';
import { TimeOptionLists } from './components/timeWheel';
import { VideoRow } from './components/videoRow';
import { useExtractionActions } from './hooks/useExtractionActions';
import { useExtractorStore } from './stores';

const ExtractorPage: React.FC = () => {
  const entryOrder = useExtractorStore((state) => state.entryOrder);
  const isExtracting = useExtractorStore((state) => state.extraction.isExtracting);
  const { extract, extractAll, play } = useExtractionActions();

  const [config, setConfig] = useState<PublicAppConfig | null>(null);
  const [isAddDialogOpen, setIsAddDialogOpen] = useState(false);

  useEffect(() => {
    let cancelled = false;

    const loadConfig = async () => {
      const response = await extractorApi.getConfig();
      if (cancelled) return;
      if (response.success) {
        setConfig(response.config);
      } else {
        toast.error('Backend is not reachable', { description: response.error });
      }
    };

    loadConfig().catch((error: unknown) => {
      console.error('❌ Failed to load configuration:', error);
    });

    return () => {
      cancelled = true;
    };
  }, []);

  return (
    <div className="mx-auto flex min-h-screen max-w-6xl flex-col gap-4 p-6">
      <header className="flex items-center gap-3">
        <Film className="size-7 text-primary" />
        <h1 className="text-xl font-semibold">Multi-Video In-Out Extractor</h1>
        {config && (
          <span className="ml-auto truncate text-xs text-muted-foreground" title={config.ffmpegPath}>
            Clips go to {config.outputDir}
          </span>
        )}
      </header>

      <QuickInsertBar />
      <TimeOptionLists />

      <main className="flex-1 overflow-y-auto rounded-lg border border-border bg-card">
        {entryOrder.length === 0 ? (
          <p className="px-4 py-12 text-center text-sm text-muted-foreground">
            No videos yet. Add some to start picking in and out points.
          </p>
        ) : (
          <ul>
            {entryOrder.map((path) => (
              <VideoRow key={path} path={path} onExtract={extract} onPlay={play} />
            ))}
          </ul>
        )}
      </main>

      <footer className="flex justify-end gap-2">
        <Button variant="outline" onClick={() => setIsAddDialogOpen(true)}>
          <FolderPlus />
          Add Videos
        </Button>
        <Button
          disabled={isExtracting || entryOrder.length === 0}
          onClick={extractAll}
        >
          <Scissors />
          Extract All Videos
        </Button>
      </footer>

      <AddVideosDialog
        isOpen={isAddDialogOpen}
        onClose={() => setIsAddDialogOpen(false)}
      />
    </div>
  );
};

export default ExtractorPage;
