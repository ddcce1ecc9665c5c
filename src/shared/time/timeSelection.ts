/**
 * Time selection helpers shared by the renderer selectors and the backend
 * extraction service. All values are whole seconds.
 */
import { TIME_UNIT_MAX } from '../media/videoFiles';
import type { TimeParts, TimeUnit } from '../types/extractor.types';

export const INVALID_RANGE_MESSAGE = 'OUT time must be greater than IN time.';

export const combineTimeParts = ({
  hours,
  minutes,
  seconds,
}: TimeParts): number => hours * 3600 + minutes * 60 + seconds;

export const splitSeconds = (total: number): TimeParts => {
  const safeTotal = coerceSeconds(total);
  return {
    hours: Math.floor(safeTotal / 3600),
    minutes: Math.floor((safeTotal % 3600) / 60),
    seconds: safeTotal % 60,
  };
};

/**
 * Non-negative integers pass through, anything else becomes 0.
 */
export const coerceSeconds = (value: unknown): number => {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    return 0;
  }
  return value;
};

/**
 * Parse a manual entry for one HH/MM/SS component.
 *
 * Non-numeric text and values outside the unit's range resolve to 0, so a
 * bad edit reads the same as an intentional zero.
 *
 * @example
 * parseTimeComponent('07', 'minutes') // 7
 * parseTimeComponent('abc', 'hours') // 0
 * parseTimeComponent('45', 'hours') // 0
 */
export const parseTimeComponent = (
  raw: string | number,
  unit: TimeUnit,
): number => {
  const text = String(raw).trim();
  if (!/^\d+$/.test(text)) {
    return 0;
  }

  const value = parseInt(text, 10);
  return value <= TIME_UNIT_MAX[unit] ? value : 0;
};

export const withTimeComponent = (
  total: number,
  unit: TimeUnit,
  value: number,
): number => combineTimeParts({ ...splitSeconds(total), [unit]: value });

export const padComponent = (value: number): string =>
  value.toString().padStart(2, '0');

export const formatClock = (total: number): string => {
  const { hours, minutes, seconds } = splitSeconds(total);
  return `${padComponent(hours)}:${padComponent(minutes)}:${padComponent(seconds)}`;
};

/** Returns the reason a range cannot be extracted, or null when it can */
export const validateRange = (
  inSeconds: number,
  outSeconds: number,
): string | null =>
  inSeconds >= outSeconds ? INVALID_RANGE_MESSAGE : null;
