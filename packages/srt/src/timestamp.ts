import { createTimeSpan } from '@subalign/core';
import type { TimeSpan } from '@subalign/core';

const TIMESTAMP_RE = /^\d{2}:\d{2}:\d{2},\d{3}$/;
const TIME_LINE_RE = /^(\d{2}:\d{2}:\d{2},\d{3})\s*-->\s*(\d{2}:\d{2}:\d{2},\d{3})\s*$/;

const MS_PER_HOUR = 3_600_000;
const MS_PER_MINUTE = 60_000;
const MS_PER_SECOND = 1000;

/** `HH:MM:SS,mmm` to milliseconds; null when malformed or minutes/seconds exceed 59. */
export function parseSrtTimestamp(value: string): number | null {
  const text = value.trim();
  if (!TIMESTAMP_RE.test(text)) return null;

  const hours = Number.parseInt(text.slice(0, 2), 10);
  const minutes = Number.parseInt(text.slice(3, 5), 10);
  const seconds = Number.parseInt(text.slice(6, 8), 10);
  const millis = Number.parseInt(text.slice(9, 12), 10);
  if (minutes > 59 || seconds > 59) return null;

  return hours * MS_PER_HOUR + minutes * MS_PER_MINUTE + seconds * MS_PER_SECOND + millis;
}

export function parseSrtTimeLine(line: string): TimeSpan | null {
  const match = TIME_LINE_RE.exec(line.trim());
  if (!match) return null;

  const start = parseSrtTimestamp(match[1]);
  const end = parseSrtTimestamp(match[2]);
  if (start === null || end === null) return null;
  return createTimeSpan(start, end);
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function formatSrtTimestamp(ms: number): string {
  const total = Number.isFinite(ms) ? Math.max(0, Math.floor(ms)) : 0;
  const hours = Math.floor(total / MS_PER_HOUR);
  const minutes = Math.floor((total % MS_PER_HOUR) / MS_PER_MINUTE);
  const seconds = Math.floor((total % MS_PER_MINUTE) / MS_PER_SECOND);
  const millis = total % MS_PER_SECOND;
  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)},${pad(millis, 3)}`;
}

export function formatSrtTimeRange(span: TimeSpan): string {
  return `${formatSrtTimestamp(span.startMs)} --> ${formatSrtTimestamp(span.endMs)}`;
}
