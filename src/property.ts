/**
 * vCard v4 properties — RFC 6350 §6
 *
 * A property is kept close to its wire form: the name as written, the group
 * label (empty when absent), ordered parameters and an ordered list of raw
 * values. Only the compound properties N and ADR are split into fields.
 */

import type { Parameter } from './types.js';
import { fail, ok, type Result } from './errors.js';
import { splitCompound, splitParamString, unquoteParamValue } from './escape.js';

// ── Property names ─────────────────────────────────────────────────────────

/** The recognized property names (RFC 6350 §6.1–6.9) */
export const PROPERTY_NAMES = [
  'FN',
  'N',
  'NICKNAME',
  'PHOTO',
  'BDAY',
  'ANNIVERSARY',
  'GENDER',
  'ADR',
  'TEL',
  'EMAIL',
  'IMPP',
  'LANG',
  'TZ',
  'GEO',
  'TITLE',
  'ROLE',
  'LOGO',
  'ORG',
  'MEMBER',
  'RELATED',
  'CATEGORIES',
  'NOTE',
  'PRODID',
  'REV',
  'SOUND',
  'UID',
  'CLIENTPIDMAP',
  'URL',
] as const;

export type PropertyName = (typeof PROPERTY_NAMES)[number];

const KNOWN_NAMES: ReadonlySet<string> = new Set(PROPERTY_NAMES);

/** Properties whose value is a `;`-separated list of fields */
const COMPOUND_NAMES: ReadonlySet<string> = new Set(['N', 'ADR']);

/** Number of fields an N value must have */
export const N_FIELD_COUNT = 5;

/** Case-insensitive whitelist check */
export function isKnownPropertyName(name: string): boolean {
  return KNOWN_NAMES.has(name.toUpperCase());
}

export function isCompoundProperty(name: string): boolean {
  return COMPOUND_NAMES.has(name.toUpperCase());
}

// ── Property ───────────────────────────────────────────────────────────────

export class Property {
  /** Property name as written (e.g. `tel`, `TEL`) */
  name: string;
  /** Group label (e.g. `item1`), empty string when absent */
  group: string;
  parameters: Parameter[];
  values: string[];

  constructor(
    name: string,
    values: string[] = [],
    parameters: Parameter[] = [],
    group = '',
  ) {
    this.name = name;
    this.values = values;
    this.parameters = parameters;
    this.group = group;
  }

  /** Uppercased name, for comparisons */
  get baseName(): string {
    return this.name.toUpperCase();
  }

  get isCompound(): boolean {
    return isCompoundProperty(this.name);
  }

  /** First value, or empty string */
  get value(): string {
    return this.values[0] ?? '';
  }

  /** First parameter with the given name (case-insensitive) */
  getParameter(name: string): string | undefined {
    const upper = name.toUpperCase();
    return this.parameters.find(p => p.name.toUpperCase() === upper)?.value;
  }

  /** VALUE parameter */
  get valueType(): string | undefined {
    return this.getParameter('VALUE');
  }

  /** Whether any parameter is `VALUE=text` (both sides case-insensitive) */
  get isTextValue(): boolean {
    return this.parameters.some(
      p => p.name.toUpperCase() === 'VALUE' && unquoteParamValue(p.value).toLowerCase() === 'text',
    );
  }

  /** Independent copy: no array or parameter object is shared */
  clone(): Property {
    return new Property(
      this.name,
      [...this.values],
      this.parameters.map(p => ({ ...p })),
      this.group,
    );
  }
}

// ── Builder ────────────────────────────────────────────────────────────────

/**
 * Build a Property from the two halves of a content line.
 *
 * `rawName` is `[GROUP.]NAME[;KEY=VALUE]*`. Every parameter must have a
 * non-empty key and value once trimmed. The name itself is not checked
 * against the whitelist here; that is the validator's job.
 */
export function buildProperty(rawName: string, rawValue: string): Result<Property> {
  const [head = '', ...paramTokens] = splitParamString(rawName);

  const dot = head.indexOf('.');
  const group = dot === -1 ? '' : head.slice(0, dot).trim();
  const name = (dot === -1 ? head : head.slice(dot + 1)).trim();
  if (!name) {
    return fail('InvalidProperty', `Empty property name in "${rawName}"`);
  }

  const parameters: Parameter[] = [];
  for (const token of paramTokens) {
    const eq = token.indexOf('=');
    if (eq === -1) {
      return fail('InvalidProperty', `Parameter without "=" on ${name}: "${token}"`, name);
    }
    const key = token.slice(0, eq).trim();
    const value = token.slice(eq + 1).trim();
    if (!key || !value) {
      return fail('InvalidProperty', `Empty parameter name or value on ${name}: "${token}"`, name);
    }
    parameters.push({ name: key, value });
  }

  const values = isCompoundProperty(name) ? splitCompound(rawValue) : [rawValue];
  return ok(new Property(name, values, parameters, group));
}
