/**
 * vCard v4 generator
 *
 * Output:
 *   - CRLF line endings (§3.2)
 *   - BEGIN, VERSION:4.0, FN, optional properties in stored order,
 *     BDAY, ANNIVERSARY, END
 *   - parameter values containing `,` or `;` quoted
 *   - values written exactly as stored (no escaping, no folding)
 */

import type { CardShape, DateTime, Parameter } from './types.js';
import type { Property } from './property.js';
import { quoteParamValue } from './escape.js';
import { isCompoundProperty } from './property.js';
import { formatDateTime } from './datetime.js';

const CRLF = '\r\n';

/** The subset of a card the generator reads */
export interface SerializableCard extends CardShape {
  fn: Property;
  optionalProperties: readonly Property[];
  birthday?: DateTime;
  anniversary?: DateTime;
}

// ── Parameter serialization ───────────────────────────────────────────────

/** `NAME=VALUE`, quoting the value when necessary */
export function serializeParameter(param: Parameter): string {
  return `${param.name}=${quoteParamValue(param.value)}`;
}

/** Parameters joined with `;` (no leading semicolon) */
export function serializeParameters(params: readonly Parameter[]): string {
  return params.map(serializeParameter).join(';');
}

// ── Value serialization ───────────────────────────────────────────────────

/**
 * Join a property's values.
 *
 * Compound properties (N, ADR) use `;`, everything else `,`. A value list
 * holding a phone extension (`ext=`) is joined with `;` whatever the
 * property, so `tel:+1-555-0100;ext=12` stays one value.
 */
export function serializeValues(name: string, values: readonly string[]): string {
  const delimiter =
    isCompoundProperty(name) || values.some(v => v.includes('ext=')) ? ';' : ',';
  return values.join(delimiter);
}

// ── Content line serialization ────────────────────────────────────────────

/** Serialize a Property to a content line (without CRLF) */
export function serializeProperty(prop: Property): string {
  const namePart = prop.group ? `${prop.group}.${prop.name}` : prop.name;
  const paramStr = serializeParameters(prop.parameters);
  const separator = paramStr ? `;${paramStr}` : '';
  return `${namePart}${separator}:${serializeValues(prop.name, prop.values)}`;
}

/**
 * Serialize a BDAY/ANNIVERSARY value to a content line (without CRLF).
 *
 *   text       → `NAME;VALUE=text:circa 1990`
 *   time only  → `NAME:T143000`
 *   otherwise  → `NAME:<date><time>` (+ ` UTC`)
 */
export function serializeDateTime(name: string, dt: DateTime): string {
  if (dt.isText) return `${name};VALUE=text:${dt.text}`;
  if (dt.date.length === 0 && dt.time.length > 0) return `${name}:T${dt.time}`;
  return `${name}:${formatDateTime(dt)}`;
}

// ── Card serialization ────────────────────────────────────────────────────

/**
 * Serialize a card to vCard text. Does not validate; a card that passes
 * `validateCard` always serializes.
 */
export function serializeCard(card: SerializableCard): string {
  const lines: string[] = ['BEGIN:VCARD', 'VERSION:4.0', serializeProperty(card.fn)];

  for (const prop of card.optionalProperties) {
    lines.push(serializeProperty(prop));
  }
  if (card.birthday) lines.push(serializeDateTime('BDAY', card.birthday));
  if (card.anniversary) lines.push(serializeDateTime('ANNIVERSARY', card.anniversary));

  lines.push('END:VCARD');
  return lines.map(line => line + CRLF).join('');
}

// ── Debug dump ─────────────────────────────────────────────────────────────

/**
 * Human-readable summary of a card, one section per field:
 *
 * ```
 * Card:
 *  FN: FN:John Doe
 *  Optional Properties: N:Doe;John;;;,EMAIL:john@example.com
 *  Birthday: 19900615
 *  Anniversary: NULL
 * ```
 */
export function describeCard(card: SerializableCard): string {
  const optional = card.optionalProperties.map(serializeProperty);
  let list = optional[0] ?? '';
  for (const line of optional.slice(1)) {
    list += (line.includes('ext=') ? ';' : ',') + line;
  }

  return (
    'Card:\n FN: ' + serializeProperty(card.fn) +
    '\n Optional Properties: ' + list +
    '\n Birthday: ' + (card.birthday ? formatDateTime(card.birthday) : 'NULL') +
    '\n Anniversary: ' + (card.anniversary ? formatDateTime(card.anniversary) : 'NULL') +
    '\n'
  );
}
