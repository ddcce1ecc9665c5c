import { cn } from '@/frontend/utils/utils';
import { padComponent } from '@/shared/time/timeSelection';
import React from 'react';
import { useExtractorStore } from '../stores';

const QUICK_INSERT_VALUES = Array.from({ length: 60 }, (_, value) => value);
const BUTTONS_PER_ROW = 20;
// Values that are valid in every field, hours included
const HOUR_SAFE_MAX = 2;

const rows = [0, BUTTONS_PER_ROW, BUTTONS_PER_ROW * 2].map((start) =>
  QUICK_INSERT_VALUES.slice(start, start + BUTTONS_PER_ROW),
);

export const QuickInsertBar: React.FC = () => {
  const activeField = useExtractorStore((state) => state.activeField);
  const activeName = useExtractorStore((state) =>
    state.activeField ? state.entriesByPath[state.activeField.path]?.name : undefined,
  );
  const quickInsert = useExtractorStore((state) => state.quickInsert);

  return (
    <section
      aria-label="Quick insert"
      className="rounded-lg border border-border bg-card p-3"
    >
      <p className="mb-2 text-xs text-muted-foreground">
        {activeField && activeName
          ? `Inserting into ${activeField.point.toUpperCase()} ${activeField.unit} of ${activeName}`
          : 'Focus a time field, then pick a value'}
      </p>
      <div className="flex flex-col gap-1">
        {rows.map((values) => (
          <div
            key={values[0]}
            data-slot="quick-insert-row"
            className="grid grid-cols-[repeat(20,minmax(0,1fr))] gap-1"
          >
            {values.map((value) => {
              const accent = value <= HOUR_SAFE_MAX ? 'hour' : 'minute';
              return (
                <button
                  key={value}
                  type="button"
                  data-accent={accent}
                  title={`Insert ${padComponent(value)}`}
                  className={cn(
                    'rounded border py-1 text-xs tabular-nums transition-colors',
                    accent === 'hour'
                      ? 'border-hour text-hour hover:bg-hour/10'
                      : 'border-minute text-minute hover:bg-minute/10',
                  )}
                  onClick={() => quickInsert(value)}
                >
                  {value}
                </button>
              );
            })}
          </div>
        ))}
      </div>
    </section>
  );
};
