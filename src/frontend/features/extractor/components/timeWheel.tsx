import { cn } from '@/frontend/utils/utils';
import { TIME_UNIT_MAX } from '@/shared/media/videoFiles';
import { padComponent, splitSeconds } from '@/shared/time/timeSelection';
import type { TimePoint, TimeUnit } from '@/shared/types/extractor.types';
import React, { useState } from 'react';
import { useExtractorStore } from '../stores';

const optionListId = (unit: TimeUnit) =>
  unit === 'hours' ? 'time-options-hours' : 'time-options-sixty';

/** Shared datalists behind every time field; render once per page */
export const TimeOptionLists: React.FC = () => (
  <>
    {(['hours', 'minutes'] as const).map((unit) => (
      <datalist key={unit} id={optionListId(unit)}>
        {Array.from({ length: TIME_UNIT_MAX[unit] + 1 }, (_, value) => (
          <option key={value} value={padComponent(value)} />
        ))}
      </datalist>
    ))}
  </>
);

interface TimeWheelProps {
  path: string;
  point: TimePoint;
  unit: TimeUnit;
  totalSeconds: number;
  disabled?: boolean;
}

/**
 * One HH, MM or SS component. Typed text is kept as a draft and committed on
 * blur or Enter; the store turns anything unusable into 0.
 */
export const TimeWheel: React.FC<TimeWheelProps> = ({
  path,
  point,
  unit,
  totalSeconds,
  disabled = false,
}) => {
  const setActiveField = useExtractorStore((state) => state.setActiveField);
  const setTimeComponent = useExtractorStore((state) => state.setTimeComponent);
  const [draft, setDraft] = useState<string | null>(null);

  const committed = padComponent(splitSeconds(totalSeconds)[unit]);

  const commit = () => {
    if (draft === null) return;
    setTimeComponent(path, point, unit, draft);
    setDraft(null);
  };

  return (
    <input
      className={cn(
        'w-9 rounded border border-input bg-background px-1 py-0.5 text-center text-sm tabular-nums outline-none',
        'focus-visible:ring-2 focus-visible:ring-ring disabled:opacity-50',
        unit === 'hours' ? 'focus-visible:border-hour' : 'focus-visible:border-minute',
      )}
      type="text"
      inputMode="numeric"
      maxLength={2}
      list={optionListId(unit)}
      aria-label={`${point.toUpperCase()} ${unit}`}
      disabled={disabled}
      value={draft ?? committed}
      onFocus={(event) => {
        setActiveField({ path, point, unit });
        event.currentTarget.select();
      }}
      onChange={(event) => setDraft(event.target.value)}
      onBlur={commit}
      onKeyDown={(event) => {
        if (event.key === 'Enter') commit();
      }}
    />
  );
};
