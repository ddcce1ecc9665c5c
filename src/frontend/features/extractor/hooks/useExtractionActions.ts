import { getFileName } from '@/shared/media/videoFiles';
import type { ExtractionOutcome } from '@/shared/types/extractor.types';
import { useCallback } from 'react';
import { toast } from 'sonner';
import { useExtractorStore } from '../stores';

export const describeOutcome = (outcome: ExtractionOutcome): string =>
  outcome.success
    ? `Extraction completed for ${getFileName(outcome.sourcePath)}!`
    : outcome.error;

const notifyOutcome = (outcome: ExtractionOutcome) => {
  if (outcome.success) {
    toast.success(describeOutcome(outcome), { description: outcome.outputPath });
    return;
  }

  if (outcome.errorKind === 'invalid-range') {
    toast.error(outcome.error);
    return;
  }

  toast.error(`Failed to extract ${getFileName(outcome.sourcePath)}`, {
    description: outcome.error,
  });
};

/**
 * Store actions wrapped with user feedback, one toast per extraction result.
 */
export const useExtractionActions = () => {
  const extractEntry = useExtractorStore((state) => state.extractEntry);
  const extractAllEntries = useExtractorStore((state) => state.extractAll);
  const playEntry = useExtractorStore((state) => state.playEntry);

  const extract = useCallback(
    async (path: string) => {
      const outcome = await extractEntry(path);
      if (outcome) notifyOutcome(outcome);
    },
    [extractEntry],
  );

  const extractAll = useCallback(async () => {
    const outcomes = await extractAllEntries();
    if (outcomes.length === 0) {
      toast.info('Add some videos first');
      return;
    }

    outcomes.forEach(notifyOutcome);
  }, [extractAllEntries]);

  const play = useCallback(
    async (path: string) => {
      const response = await playEntry(path);
      if (!response.success) {
        toast.error(`Could not open ${getFileName(path)}`, {
          description: response.error,
        });
      }
    },
    [playEntry],
  );

  return { extract, extractAll, play };
};
