import { Button } from '@/frontend/components/ui/button';
import { formatClock } from '@/shared/time/timeSelection';
import type { TimePoint } from '@/shared/types/extractor.types';
import { AlertCircle, CheckCircle2, Loader2, Play, Scissors } from 'lucide-react';
import React from 'react';
import { useExtractorStore } from '../stores';
import { TimeWheel } from './timeWheel';

interface TimeSelectorProps {
  path: string;
  point: TimePoint;
  totalSeconds: number;
  disabled: boolean;
}

const TimeSelector: React.FC<TimeSelectorProps> = ({
  path,
  point,
  totalSeconds,
  disabled,
}) => (
  <div className="flex items-center gap-1" title={formatClock(totalSeconds)}>
    <span className="w-8 text-xs font-semibold text-muted-foreground">{point.toUpperCase()}</span>
    <TimeWheel path={path} point={point} unit="hours" totalSeconds={totalSeconds} disabled={disabled} />
    <span className="text-muted-foreground">:</span>
    <TimeWheel path={path} point={point} unit="minutes" totalSeconds={totalSeconds} disabled={disabled} />
    <span className="text-muted-foreground">:</span>
    <TimeWheel path={path} point={point} unit="seconds" totalSeconds={totalSeconds} disabled={disabled} />
  </div>
);

interface VideoRowProps {
  path: string;
  onExtract: (path: string) => void;
  onPlay: (path: string) => void;
}

export const VideoRow: React.FC<VideoRowProps> = ({ path, onExtract, onPlay }) => {
  const entry = useExtractorStore((state) => state.entriesByPath[path]);
  const isExtracting = useExtractorStore((state) => state.extraction.isExtracting);
  const isCurrent = useExtractorStore(
    (state) => state.extraction.currentPath === path,
  );
  const lastOutcome = useExtractorStore(
    (state) => state.extraction.lastOutcomes[path],
  );

  if (!entry) return null;

  return (
    <li className="grid grid-cols-[minmax(0,1fr)_auto_auto_1.5rem_auto_auto] items-center gap-3 border-b border-border px-4 py-2 last:border-b-0">
      <span className="truncate text-sm" title={entry.path}>
        {entry.name}
      </span>

      <TimeSelector path={path} point="in" totalSeconds={entry.inTime} disabled={isExtracting} />
      <TimeSelector path={path} point="out" totalSeconds={entry.outTime} disabled={isExtracting} />

      <span className="flex justify-center">
        {isCurrent && <Loader2 className="size-4 animate-spin text-primary" aria-label="Extracting" />}
        {!isCurrent && lastOutcome?.success === true && (
          <CheckCircle2 className="size-4 text-success" aria-label={lastOutcome.outputPath} />
        )}
        {!isCurrent && lastOutcome?.success === false && (
          <AlertCircle className="size-4 text-destructive" aria-label={lastOutcome.error} />
        )}
      </span>

      <Button size="sm" disabled={isExtracting} onClick={() => onExtract(path)}>
        <Scissors />
        Extract
      </Button>
      <Button variant="ghost" size="sm" onClick={() => onPlay(path)}>
        <Play />
        Play
      </Button>
    </li>
  );
};
