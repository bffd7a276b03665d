import { BackgroundTooShortError, WindowSelectionError } from '@threadcast/shared';
import type { BackgroundKind, SelectedWindow } from '@threadcast/shared';

export interface WindowOptions {
  /** Uniform in [0, 1). */
  random?: () => number;
  /** Named in errors. */
  source?: string;
  kind?: BackgroundKind;
}

/**
 * Pick a random whole-second window of `requiredDuration` seconds inside a
 * source of `sourceDuration` seconds, keeping a small margin from the end
 * when the source allows it. A source no longer than the request yields the
 * whole source, flagged as degraded.
 */
export function getStartAndEndTimes(
  requiredDuration: number,
  sourceDuration: number,
  options: WindowOptions = {},
): SelectedWindow {
  const { random = Math.random, source = 'background', kind = 'video' } = options;
  let needed = Math.trunc(requiredDuration);
  const length = Math.trunc(sourceDuration);

  if (needed <= 0) needed = 1;

  if (length <= needed) {
    if (length > 0) return { start: 0, end: length, degraded: true };
    throw new BackgroundTooShortError(source, needed, length, kind);
  }

  const margin = Math.min(2, Math.floor(length / 10));
  let maxStart = length - needed - margin;
  if (maxStart < 0) maxStart = Math.max(0, length - needed);

  let start = maxStart <= 0 ? 0 : randomInt(0, maxStart, random);
  let end = start + needed;

  if (end > length) {
    end = length;
    start = Math.max(0, end - needed);
  }

  if (end <= start) {
    start = 0;
    end = Math.min(needed, length);
    if (end <= start) {
      throw new WindowSelectionError(source, needed, length, kind);
    }
    return { start, end, degraded: true };
  }

  return { start, end, degraded: end - start !== needed };
}

/** Inclusive on both ends. */
export function randomInt(min: number, max: number, random: () => number = Math.random): number {
  return Math.min(max, min + Math.floor(random() * (max - min + 1)));
}
