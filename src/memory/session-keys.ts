import type { PipelineKind } from '@/pipeline/types';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local calendar date as YYYYMMDD. */
export function compactDate(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/** Local time as "YYYY-MM-DD HH:MM:SS". */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Profile sessions are per user; planning sessions are per user and local day,
 * so requests on the same day share context.
 */
export function sessionIdFor(kind: PipelineKind, userId: string, date: Date = new Date()): string {
  return kind === 'profile' ? `${userId}_profile` : `${userId}_meal_${compactDate(date)}`;
}
