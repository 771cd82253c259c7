/**
 * BDAY / ANNIVERSARY values (RFC 6350 §6.2.5, §6.2.6)
 *
 * Only the shape `[YYYYMMDD][T[HHMMSS]]` or `VALUE=text` free text is
 * understood. Construction never rejects anything; field lengths are checked
 * by the validator.
 */

import type { DateTime, StructuredDateTime, TextDateTime } from './types.js';

export function textDateTime(text: string): TextDateTime {
  return { isText: true, text };
}

export function structuredDateTime(date: string, time = '', utc = false): StructuredDateTime {
  return { isText: false, date, time, utc };
}

/**
 * Split a raw date-and-or-time value into its date and time halves.
 *
 *   `T143000`         → time only
 *   `19900615T143000` → date + time
 *   `19900615`        → date only
 *
 * No timezone handling: a trailing `Z` or offset stays part of the time.
 */
export function buildDateTime(rawValue: string, isText: boolean): DateTime {
  if (isText) return textDateTime(rawValue);

  if (rawValue.startsWith('T')) {
    return structuredDateTime('', rawValue.slice(1));
  }

  const t = rawValue.indexOf('T');
  if (t === -1) return structuredDateTime(rawValue);
  return structuredDateTime(rawValue.slice(0, t), rawValue.slice(t + 1));
}

/** Independent copy */
export function cloneDateTime(dt: DateTime): DateTime {
  return dt.isText ? textDateTime(dt.text) : structuredDateTime(dt.date, dt.time, dt.utc);
}

/**
 * Flat rendering used by the debug dump: text as-is, otherwise date and
 * time concatenated, with ` UTC` when flagged.
 */
export function formatDateTime(dt: DateTime): string {
  if (dt.isText) return dt.text;
  return dt.date + dt.time + (dt.utc ? ' UTC' : '');
}
