export const DAY_SEC = 24 * 60 * 60;

const CLOCK_RE = /^(\d{1,2}):(\d{2})$/;

/**
 * Parse "HH:mm" (hour 0-23, minute 0-59) into minutes since midnight.
 * Returns `undefined` for anything else.
 */
export function parseClock(time: string): number | undefined {
  const m = CLOCK_RE.exec(time.trim());
  if (!m) return undefined;
  const hh = Number(m[1]);
  const mm = Number(m[2]);
  if (hh > 23 || mm > 59) return undefined;
  return hh * 60 + mm;
}

export function minToHhmm(min: number): string {
  const h = Math.floor(min / 60);
  const m = Math.floor(min % 60);
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}

/** Seconds since midnight to "HH:mm" on a 24h clock, truncating seconds. */
export function secToHhmm(sec: number): string {
  const dayMin = Math.floor((sec % DAY_SEC) / 60);
  return minToHhmm(dayMin);
}

/** Like {@link secToHhmm} but marks times on a following day, e.g. "00:30+1d". */
export function formatClock(sec: number): string {
  const days = Math.floor(sec / DAY_SEC);
  return days > 0 ? `${secToHhmm(sec)}+${days}d` : secToHhmm(sec);
}

/** "Xh Ym" with seconds dropped. */
export function formatDuration(sec: number): string {
  const h = Math.floor(sec / 3600);
  const m = Math.floor((sec % 3600) / 60);
  return `${h}h ${m}m`;
}

export function todayIsoDate(now = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

export function formatTimestampToken(ts: string): string {
  const d = new Date(ts);
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(
    d.getDate(),
  )}T${pad(d.getHours())}${pad(d.getMinutes())}`;
}
