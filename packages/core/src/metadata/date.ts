const ISO_TIMESTAMP_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;

function toInt(text: string | undefined): number {
  return text === undefined ? 0 : Number.parseInt(text, 10);
}

function parseOffsetMinutes(zone: string | undefined): number {
  if (zone === undefined || zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = toInt(digits.slice(0, 2));
  const minutes = toInt(digits.slice(2, 4) || undefined);
  return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO-8601 timestamp (`2016-07-20T14:06:00`, optionally with
 * fractional seconds and a `Z`/`±HH:MM` offset).
 * Timestamps without an offset are read as UTC.
 * Returns undefined when the text is not a valid timestamp.
 */
export function parseIsoTimestamp(text: string): Date | undefined {
  const match = ISO_TIMESTAMP_RE.exec(text.trim());
  if (!match) return undefined;

  const [, y, mo, d, h, mi, s, frac, zone] = match;
  const year = toInt(y);
  const month = toInt(mo);
  const day = toInt(d);
  const hour = toInt(h);
  const minute = toInt(mi);
  const second = toInt(s);
  const millis = frac ? toInt(frac.padEnd(3, '0').slice(0, 3)) : 0;

  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59) {
    return undefined;
  }
  if (second > 59) return undefined;

  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const probe = new Date(utc);
  // Reject rollovers such as 2016-02-30
  if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return undefined;
  }
  return new Date(utc - parseOffsetMinutes(zone) * 60_000);
}
