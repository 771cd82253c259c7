/**
 * VCard — the single-card container
 *
 * Holds the required FN property, the ordered optional properties and the
 * dedicated birthday / anniversary values, plus methods for parsing,
 * validating and generating vCard text.
 */

import type { DateTime, GenerateOptions, ParseOptions, ParseWarning } from './types.js';
import { ok, unwrap, type Result } from './errors.js';
import { Property } from './property.js';
import { cloneDateTime, formatDateTime } from './datetime.js';
import { parseCardText } from './parser.js';
import { validateCard } from './validator.js';
import { describeCard, serializeCard } from './generator.js';

/**
 * A vCard v4 object.
 *
 * Usage:
 * ```ts
 * // Parse
 * const vcard = VCard.parse(text);
 *
 * // Build
 * const vcard = VCard.create('Alice Example');
 * vcard.optionalProperties.push(new Property('EMAIL', ['alice@example.com']));
 * vcard.birthday = structuredDateTime('19900615');
 * console.log(vcard.toString());
 * ```
 */
export class VCard {
  /** Formatted Name (RFC 6350 §6.2.1), required */
  fn: Property;

  /** Every other property, in the order encountered */
  optionalProperties: Property[] = [];

  /** Birthday (RFC 6350 §6.2.5) */
  birthday?: DateTime;

  /** Anniversary (RFC 6350 §6.2.6) */
  anniversary?: DateTime;

  /** Warnings accumulated during parsing */
  parseWarnings: ParseWarning[] = [];

  constructor(fn: Property) {
    this.fn = fn;
  }

  // ── Factory methods ─────────────────────────────────────────────────────

  /**
   * Parse the first vCard in `text`.
   * Never throws; the error Result names what was wrong.
   */
  static fromText(text: string, options?: ParseOptions): Result<VCard> {
    const parsed = parseCardText(text, options);
    if (!parsed.ok) return parsed;

    const { fn, optionalProperties, birthday, anniversary, warnings } = parsed.value;
    const vc = new VCard(fn);
    vc.optionalProperties = optionalProperties;
    if (birthday) vc.birthday = birthday;
    if (anniversary) vc.anniversary = anniversary;
    vc.parseWarnings = warnings;
    return ok(vc);
  }

  /**
   * Parse the first vCard in `text`.
   * @throws VCardError if the text is not a valid card
   */
  static parse(text: string, options?: ParseOptions): VCard {
    return unwrap(VCard.fromText(text, options));
  }

  /** Quick-create a card with just a formatted name */
  static create(fn: string): VCard {
    return new VCard(new Property('FN', [fn]));
  }

  // ── Convenience accessors ───────────────────────────────────────────────

  /** The FN value */
  get displayName(): string {
    return this.fn.value;
  }

  /** Optional properties with the given name (case-insensitive) */
  getProperties(name: string): Property[] {
    const upper = name.toUpperCase();
    return this.optionalProperties.filter(p => p.baseName === upper);
  }

  // ── Validation ──────────────────────────────────────────────────────────

  validate(): Result {
    return validateCard(this);
  }

  // ── Generation ──────────────────────────────────────────────────────────

  /**
   * Generate vCard text with CRLF line endings.
   * @throws VCardError if validation is enabled and the card is invalid
   */
  toString(options: GenerateOptions = {}): string {
    if (options.validate !== false) unwrap(this.validate());
    return serializeCard(this);
  }

  /** Multi-line human-readable dump, for debugging */
  describe(): string {
    return describeCard(this);
  }

  // ── Cloning ─────────────────────────────────────────────────────────────

  /** Deep copy; warnings are not carried over */
  clone(): VCard {
    const vc = new VCard(this.fn.clone());
    vc.optionalProperties = this.optionalProperties.map(p => p.clone());
    if (this.birthday) vc.birthday = cloneDateTime(this.birthday);
    if (this.anniversary) vc.anniversary = cloneDateTime(this.anniversary);
    return vc;
  }

  // ── JSON ────────────────────────────────────────────────────────────────

  /** Plain summary suitable for JSON serialization */
  toJSON(): Record<string, unknown> {
    return {
      version: '4.0',
      fn: this.fn.value,
      properties: this.optionalProperties.map(p => ({
        group: p.group || undefined,
        name: p.name,
        parameters: p.parameters.length ? p.parameters.map(q => ({ ...q })) : undefined,
        values: [...p.values],
      })),
      birthday: this.birthday ? formatDateTime(this.birthday) : undefined,
      anniversary: this.anniversary ? formatDateTime(this.anniversary) : undefined,
    };
  }
}
