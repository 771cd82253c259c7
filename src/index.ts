/**
 * vcf4 — strict vCard 4.0 parsing, validation and generation for a single
 * contact card.
 *
 * @example
 * ```ts
 * import { VCard, Property, parseCard } from 'vcf4';
 *
 * // Parse
 * const result = parseCard(vcardText);
 * if (result.ok) console.log(result.value.displayName);  // 'Alice Example'
 *
 * // Build
 * const vc = VCard.create('Bob Builder');
 * vc.optionalProperties.push(new Property('EMAIL', ['bob@example.com']));
 * const text = vc.toString();          // validated, CRLF output
 * ```
 */

// ── Main class ─────────────────────────────────────────────────────────────
export { VCard } from './vcard.js';

// ── Properties ─────────────────────────────────────────────────────────────
export {
  Property,
  PROPERTY_NAMES,
  N_FIELD_COUNT,
  buildProperty,
  isKnownPropertyName,
  isCompoundProperty,
} from './property.js';
export type { PropertyName } from './property.js';

// ── Date / time ────────────────────────────────────────────────────────────
export {
  buildDateTime,
  textDateTime,
  structuredDateTime,
  cloneDateTime,
  formatDateTime,
} from './datetime.js';

// ── Types ──────────────────────────────────────────────────────────────────
export type {
  Parameter,
  DateTime,
  TextDateTime,
  StructuredDateTime,
  PropertyShape,
  CardShape,
  ParseOptions,
  GenerateOptions,
  WriteOptions,
  ParseWarning,
} from './types.js';

// ── Errors ─────────────────────────────────────────────────────────────────
export { VCardError, describeError, unwrap } from './errors.js';
export type { VCardErrorCode, Result } from './errors.js';

// ── Low-level helpers ──────────────────────────────────────────────────────
export {
  findValueColon,
  splitParamString,
  splitCompound,
  needsParamQuoting,
  quoteParamValue,
  unquoteParamValue,
} from './escape.js';

// ── Reader / parser ────────────────────────────────────────────────────────
export { LineReader, DEFAULT_MAX_LINE_LENGTH, unfoldLines } from './reader.js';
export type { ReadResult } from './reader.js';
export { parseCardText, splitContentLine } from './parser.js';
export type { RawCard } from './parser.js';

// ── Validator ──────────────────────────────────────────────────────────────
export { validateCard, validateProperty, validateDateTime } from './validator.js';

// ── Generator ──────────────────────────────────────────────────────────────
export {
  serializeCard,
  serializeProperty,
  serializeParameter,
  serializeParameters,
  serializeValues,
  serializeDateTime,
  describeCard,
} from './generator.js';
export type { SerializableCard } from './generator.js';

// ── Files ──────────────────────────────────────────────────────────────────
export { createCard, writeCard, hasCardExtension } from './file.js';

// ── Convenience functions ──────────────────────────────────────────────────

import type { ParseOptions } from './types.js';
import type { Result } from './errors.js';
import { VCard } from './vcard.js';

/**
 * Parse one vCard from text.
 * Never throws; check `result.ok`.
 */
export function parseCard(text: string, options?: ParseOptions): Result<VCard> {
  return VCard.fromText(text, options);
}

/**
 * Serialize a card to vCard text.
 * @throws VCardError if the card is invalid
 */
export function stringify(vcard: VCard): string {
  return vcard.toString();
}
