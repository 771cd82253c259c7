/**
 * vCard v4 card builder — RFC 6350
 *
 * Strict, single-card parsing:
 *   - BEGIN:VCARD / END:VCARD bracketing, VERSION:4.0 and FN are required
 *   - VERSION, BDAY and ANNIVERSARY may appear once
 *   - any failure aborts the parse; no partial card is returned
 *
 * Lines before BEGIN:VCARD, extra FN lines and anything after END:VCARD are
 * tolerated and reported as warnings.
 */

import type { DateTime, ParseOptions, ParseWarning } from './types.js';
import { fail, fromException, ok, PASS, type Result, type VCardError } from './errors.js';
import { findValueColon } from './escape.js';
import { LineReader } from './reader.js';
import { buildProperty, Property } from './property.js';
import { buildDateTime } from './datetime.js';

/** A successfully built card, before it is wrapped in a VCard */
export interface RawCard {
  fn: Property;
  optionalProperties: Property[];
  birthday?: DateTime;
  anniversary?: DateTime;
  warnings: ParseWarning[];
}

type BuilderState = 'SEEKING_BEGIN' | 'IN_BODY' | 'DONE';

// ── Line splitting ─────────────────────────────────────────────────────────

/**
 * Split a content line at its value colon into trimmed name and value
 * halves. Both must be non-empty.
 */
export function splitContentLine(line: string): Result<{ name: string; value: string }> {
  const colon = findValueColon(line);
  if (colon === -1) {
    return fail('InvalidProperty', `Line has no ":" separator: ${line.slice(0, 40)}`);
  }
  const name = line.slice(0, colon).trim();
  const value = line.slice(colon + 1).trim();
  if (!name || !value) {
    return fail('InvalidProperty', `Empty property name or value: ${line.slice(0, 40)}`);
  }
  return ok({ name, value });
}

// ── Builder ────────────────────────────────────────────────────────────────

class CardBuilder {
  state: BuilderState = 'SEEKING_BEGIN';
  readonly warnings: ParseWarning[] = [];

  private fn?: Property;
  private readonly optionalProperties: Property[] = [];
  private birthday?: DateTime;
  private anniversary?: DateTime;
  private versionSeen = false;
  private versionValid = false;

  /** Feed one logical line (already trimmed) */
  feed(line: string, lineNumber: number): Result {
    const upper = line.toUpperCase();

    if (this.state === 'SEEKING_BEGIN') {
      if (upper === 'BEGIN:VCARD') {
        this.state = 'IN_BODY';
      } else {
        this.warnings.push({ line: lineNumber, message: `Skipping line before BEGIN:VCARD: ${line.slice(0, 40)}` });
      }
      return PASS;
    }

    if (upper === 'END:VCARD') {
      this.state = 'DONE';
      return PASS;
    }

    const split = splitContentLine(line);
    if (!split.ok) return withLine(split.error, lineNumber);

    const built = buildProperty(split.value.name, split.value.value);
    if (!built.ok) return withLine(built.error, lineNumber);

    return this.dispatch(built.value, lineNumber);
  }

  private dispatch(prop: Property, lineNumber: number): Result {
    switch (prop.baseName) {
      case 'VERSION':
        if (this.versionSeen) {
          return fail('InvalidCardStructure', 'Duplicate VERSION property', 'VERSION', lineNumber);
        }
        this.versionSeen = true;
        this.versionValid = prop.value === '4.0';
        return PASS;

      case 'FN':
        if (this.fn) {
          this.warnings.push({ line: lineNumber, message: 'Discarding additional FN property' });
        } else {
          this.fn = prop;
        }
        return PASS;

      case 'BDAY':
        if (this.birthday) {
          return fail('InvalidCardStructure', 'Duplicate BDAY property', 'BDAY', lineNumber);
        }
        this.birthday = buildDateTime(prop.value, prop.isTextValue);
        return PASS;

      case 'ANNIVERSARY':
        if (this.anniversary) {
          return fail('InvalidCardStructure', 'Duplicate ANNIVERSARY property', 'ANNIVERSARY', lineNumber);
        }
        this.anniversary = buildDateTime(prop.value, prop.isTextValue);
        return PASS;

      default:
        this.optionalProperties.push(prop);
        return PASS;
    }
  }

  finish(): Result<RawCard> {
    if (this.state === 'SEEKING_BEGIN') {
      return fail('InvalidCardStructure', 'Missing BEGIN:VCARD');
    }
    if (this.state === 'IN_BODY') {
      return fail('InvalidCardStructure', 'Missing END:VCARD');
    }
    if (!this.fn) {
      return fail('InvalidCardStructure', 'Missing required property: FN', 'FN');
    }
    if (!this.versionSeen) {
      return fail('InvalidCardStructure', 'Missing required property: VERSION', 'VERSION');
    }
    if (!this.versionValid) {
      return fail('InvalidCardStructure', 'VERSION must be 4.0', 'VERSION');
    }

    const card: RawCard = {
      fn: this.fn,
      optionalProperties: this.optionalProperties,
      warnings: this.warnings,
    };
    if (this.birthday) card.birthday = this.birthday;
    if (this.anniversary) card.anniversary = this.anniversary;
    return ok(card);
  }
}

function withLine(error: VCardError, line: number): Result<never> {
  return fail(error.code, `Line ${line}: ${error.message}`, error.property, line);
}

// ── Public parse API ───────────────────────────────────────────────────────

/**
 * Parse the first vCard in `input`.
 * Never throws: every failure is returned as an error Result.
 */
export function parseCardText(input: string, options: ParseOptions = {}): Result<RawCard> {
  try {
    const reader = new LineReader(input, options);
    const builder = new CardBuilder();

    while (builder.state !== 'DONE') {
      const next = reader.readLogicalLine();
      if (next.kind === 'end') break;
      if (next.kind === 'malformed') {
        return fail(
          'InvalidCardStructure',
          `Line ${next.lineNumber} is not terminated by CRLF or is too long`,
          undefined,
          next.lineNumber,
        );
      }
      const step = builder.feed(next.text.trim(), next.lineNumber);
      if (!step.ok) return step;
    }

    if (builder.state === 'DONE' && !reader.done) {
      builder.warnings.push({ line: reader.lineNumber + 1, message: 'Ignoring content after END:VCARD' });
    }
    return builder.finish();
  } catch (err) {
    return fromException(err);
  }
}
