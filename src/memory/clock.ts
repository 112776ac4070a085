/**
 * Local wall-clock formatting for record dates and times.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const DAY_MS = 24 * 60 * 60 * 1000;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** YYYY-MM-DD */
export function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** HH:MM:SS */
export function formatTime(d: Date): string {
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/** YYYYMMDD_HHMMSS, used in backup file names */
export function formatCompactStamp(d: Date): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

/**
 * Parse a record's date (YYYY-MM-DD) and optional time (HH:MM:SS) as local
 * time. Returns null for anything else.
 */
export function parseRecordDate(date: string, time = "00:00:00"): Date | null {
  const dm = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date.trim());
  const tm = /^(\d{2})[:-](\d{2})[:-](\d{2})$/.exec(time.trim());
  if (!dm || !tm) return null;
  const parsed = new Date(
    Number(dm[1]),
    Number(dm[2]) - 1,
    Number(dm[3]),
    Number(tm[1]),
    Number(tm[2]),
    Number(tm[3]),
  );
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Whole days elapsed from the start of `date` until `now`.
 */
export function daysSince(date: string, now: Date): number | null {
  const start = parseRecordDate(date);
  if (!start) return null;
  return Math.floor((now.getTime() - start.getTime()) / DAY_MS);
}
