import type { BoundingBox, TimeWindow, WindowFrequency } from '../types.js';

export const MINUTES_PER_DAY = 1440;

export function minuteOfDay(ts: number, offsetMinutes = 0) {
  const minutes = Math.floor(ts / 60_000) + offsetMinutes;
  return ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
}

/**
 * Merges occupied buckets into windows. `endMinute` is exclusive; a window
 * that crosses midnight has `startMinute > endMinute`.
 */
export function mergeBuckets(buckets: Iterable<number>, bucketMinutes: number): TimeWindow[] {
  const sorted = [...new Set(buckets)].sort((a, b) => a - b);
  const windows: TimeWindow[] = [];
  for (const bucket of sorted) {
    const start = bucket * bucketMinutes;
    const end = Math.min(MINUTES_PER_DAY, start + bucketMinutes);
    const last = windows[windows.length - 1];
    if (last && last.endMinute === start) {
      last.endMinute = end;
    } else {
      windows.push({ startMinute: start, endMinute: end });
    }
  }
  if (windows.length > 1) {
    const first = windows[0];
    const last = windows[windows.length - 1];
    if (first.startMinute === 0 && last.endMinute === MINUTES_PER_DAY) {
      windows.pop();
      windows[0] = { startMinute: last.startMinute, endMinute: first.endMinute };
    }
  }
  return windows;
}

export function windowContains(window: TimeWindow, minute: number) {
  if (window.startMinute <= window.endMinute) {
    return minute >= window.startMinute && minute < window.endMinute;
  }
  return minute >= window.startMinute || minute < window.endMinute;
}

/** Frequency recorded for the window holding `minute`, 0 outside every window. */
export function frequencyAt(windows: WindowFrequency[], minute: number) {
  return windows.find(window => windowContains(window, minute))?.frequency ?? 0;
}

/** The unobserved stretch of the day around `minute`, or null when `minute` is inside a window or there are none. */
export function gapAround(windows: TimeWindow[], minute: number): TimeWindow | null {
  if (windows.length === 0 || windows.some(window => windowContains(window, minute))) {
    return null;
  }
  let gapStart = windows[0].endMinute;
  let gapEnd = windows[0].startMinute;
  let back = MINUTES_PER_DAY;
  let ahead = MINUTES_PER_DAY;
  for (const window of windows) {
    const sinceEnd = (minute - window.endMinute + MINUTES_PER_DAY) % MINUTES_PER_DAY;
    if (sinceEnd < back) {
      back = sinceEnd;
      gapStart = window.endMinute;
    }
    const untilStart = (window.startMinute - minute + MINUTES_PER_DAY) % MINUTES_PER_DAY;
    if (untilStart < ahead) {
      ahead = untilStart;
      gapEnd = window.startMinute;
    }
  }
  return { startMinute: gapStart % MINUTES_PER_DAY, endMinute: gapEnd };
}

export function formatMinute(minute: number) {
  const normalized = ((Math.round(minute) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hours = Math.floor(normalized / 60);
  const minutes = normalized % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

export function formatWindow(window: TimeWindow) {
  return `${formatMinute(window.startMinute)}–${formatMinute(window.endMinute)}`;
}

/** Cell of the box centre on a `gridSize`×`gridSize` grid, row-major. */
export function gridCell(bbox: BoundingBox, gridSize: number) {
  const cx = bbox.left + bbox.width / 2;
  const cy = bbox.top + bbox.height / 2;
  const col = Math.min(gridSize - 1, Math.max(0, Math.floor(cx * gridSize)));
  const row = Math.min(gridSize - 1, Math.max(0, Math.floor(cy * gridSize)));
  return row * gridSize + col;
}
