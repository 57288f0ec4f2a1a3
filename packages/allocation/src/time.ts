/**
 * Clock + time-window helpers.
 *
 * Every instant in the system is a UTC `Date`. Values coming from storage or
 * the wire go through toUtcInstant(); timestamps without an offset are read
 * as UTC, never as server-local time.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Clock pinned to a settable instant. Tests and replay tooling. */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date | string | number) {
    this.current = toUtcInstant(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  set(instant: Date | string | number): void {
    this.current = toUtcInstant(instant).getTime();
  }

  advanceMinutes(minutes: number): void {
    this.current += minutes * 60_000;
  }

  advanceSeconds(seconds: number): void {
    this.current += seconds * 1000;
  }
}

const HAS_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Normalize a timestamp to a UTC instant.
 * ISO strings without a zone designator are treated as UTC.
 */
export function toUtcInstant(value: Date | string | number): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new Error("toUtcInstant: invalid Date");
    return new Date(value.getTime());
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new Error("toUtcInstant: non-finite epoch ms");
    return new Date(value);
  }
  const trimmed = value.trim();
  // Date-only strings already parse as UTC; date-times need an explicit Z.
  const dateOnly = !trimmed.includes("T") && !trimmed.includes(" ");
  const iso = HAS_OFFSET.test(trimmed) || dateOnly
    ? trimmed
    : `${trimmed.replace(" ", "T")}Z`;
  const parsed = new Date(iso);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`toUtcInstant: unparseable timestamp "${value}"`);
  }
  return parsed;
}

export function addMinutes(instant: Date, minutes: number): Date {
  return new Date(instant.getTime() + minutes * 60_000);
}

/** Whole seconds from `now` until `then`, rounded up. 0 if already past. */
export function secondsUntil(now: Date, then: Date): number {
  const ms = then.getTime() - now.getTime();
  return ms <= 0 ? 0 : Math.ceil(ms / 1000);
}

/**
 * Render a duration as "Xh Ym Zs".
 * Leading zero units are dropped; seconds are always shown.
 */
export function formatDuration(totalSeconds: number): string {
  const s = Math.max(0, Math.ceil(totalSeconds));
  const hours = Math.floor(s / 3600);
  const minutes = Math.floor((s % 3600) / 60);
  const seconds = s % 60;
  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}
