const NUMERIC = /^-?\d+(\.\d+)?$/;

// Largest offset from the epoch a Date can hold
const MAX_EPOCH_MS = 8.64e15;

// Date-only or date-time, optional seconds, fraction and zone
const ISO_8601 = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?)?$/i;

function normalizeZone(zone: string | undefined): string {
  if (!zone || zone.toUpperCase() === 'Z') return 'Z';
  return zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
}

function fromEpochSeconds(seconds: number): number | null {
  if (!Number.isFinite(seconds)) return null;
  const ms = Math.round(seconds * 1000);
  return Math.abs(ms) > MAX_EPOCH_MS ? null : ms;
}

/**
 * Parse an ISO-8601 string or epoch seconds (number or numeric string)
 * into epoch milliseconds. Returns null when the value is not a timestamp.
 * Zone-less date-times are read as UTC.
 */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value === 'number') return fromEpochSeconds(value);
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (trimmed === '') return null;
  if (NUMERIC.test(trimmed)) return fromEpochSeconds(parseFloat(trimmed));

  const match = ISO_8601.exec(trimmed);
  if (!match) return null;

  const [, date, hoursMinutes, seconds, fraction, zone] = match;
  const millis = (fraction ?? '').padEnd(3, '0').slice(0, 3);
  const canonical = hoursMinutes
    ? `${date}T${hoursMinutes}:${seconds ?? '00'}.${millis}${normalizeZone(zone)}`
    : `${date}T00:00:00.000Z`;

  const ms = Date.parse(canonical);
  return Number.isNaN(ms) ? null : ms;
}
