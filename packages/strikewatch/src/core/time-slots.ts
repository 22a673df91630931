/**
 * Slot arithmetic for the provider's fixed 10-minute cadence.
 *
 * All computations are in UTC. Inputs without an explicit offset are read
 * as UTC, never as local time.
 */

export const SLOT_MINUTES = 10;
export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

const INSTANT_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Round down to the start of the slot containing `date`
 */
export function floorToSlot(date: Date, slotMinutes: number = SLOT_MINUTES): Date {
  const width = slotMinutes * MINUTE_MS;
  return new Date(Math.floor(date.getTime() / width) * width);
}

/**
 * Slot starts `t` with `floor(start) <= t < end`.
 */
export function enumerateSlots(
  start: Date,
  end: Date,
  slotMinutes: number = SLOT_MINUTES
): Date[] {
  const width = slotMinutes * MINUTE_MS;
  const slots: Date[] = [];
  for (let t = floorToSlot(start, slotMinutes).getTime(); t < end.getTime(); t += width) {
    slots.push(new Date(t));
  }
  return slots;
}

/**
 * Canonical storage form of an instant
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

/**
 * Parse an ISO 8601 date or date-time. A missing offset means UTC.
 *
 * Accepts `2024-06-01`, `2024-06-01T00:10`, `2024-06-01 00:10:00`,
 * `2024-06-01T00:10:00+02:00`, `2024-06-01T00:10:00.000Z`.
 *
 * @throws {RangeError} When the value is not a recognisable instant
 */
export function parseInstant(value: string): Date {
  const match = INSTANT_PATTERN.exec(value.trim());
  if (!match) {
    throw new RangeError(`Invalid timestamp: "${value}"`);
  }

  const [, year, month, day, hour = '00', minute = '00', second = '00', fraction = '', zone] = match;
  const millis = fraction.padEnd(3, '0').slice(0, 3);

  let offset = 'Z';
  if (zone && zone.toUpperCase() !== 'Z') {
    const digits = zone.slice(1).replace(':', '');
    offset = `${zone[0]}${digits.slice(0, 2)}:${digits.slice(2, 4) || '00'}`;
  }

  const parsed = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${offset}`);
  if (Number.isNaN(parsed.getTime())) {
    throw new RangeError(`Invalid timestamp: "${value}"`);
  }
  return parsed;
}

/**
 * Normalize a stored timestamp to canonical form, or null when unparseable.
 * Older stores wrote `+00:00` offsets without milliseconds.
 */
export function normalizeTimestamp(value: string): string | null {
  try {
    return formatTimestamp(parseInstant(value));
  } catch {
    return null;
  }
}

/**
 * Provider path segment for a slot: `YYYY/MM/DD/HH/mm`
 */
export function slotPath(slot: Date): string {
  return [
    slot.getUTCFullYear(),
    pad(slot.getUTCMonth() + 1),
    pad(slot.getUTCDate()),
    pad(slot.getUTCHours()),
    pad(slot.getUTCMinutes()),
  ].join('/');
}

/**
 * Archive file name for a slot: `YYYYMMDD_HHMM.json`
 */
export function archiveFileName(slot: Date): string {
  return (
    `${slot.getUTCFullYear()}${pad(slot.getUTCMonth() + 1)}${pad(slot.getUTCDate())}` +
    `_${pad(slot.getUTCHours())}${pad(slot.getUTCMinutes())}.json`
  );
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MINUTE_MS);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * `HH:MM UTC`, used in operator notifications
 */
export function formatClockTime(date: Date): string {
  return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`;
}
