/**
 * Card validation — an independent pass over a built card.
 *
 * Checks run in a fixed order and the first failure is returned. The input
 * is never modified. Accepts loosely shaped objects so that hand-assembled
 * cards are rejected rather than crashing the checks.
 */

import type { CardShape, DateTime, PropertyShape } from './types.js';
import { fail, PASS, type Result } from './errors.js';
import { isKnownPropertyName, N_FIELD_COUNT } from './property.js';

const DATE_LENGTH = 8; // YYYYMMDD
const TIME_LENGTH = 6; // HHMMSS

/**
 * Validate a single property.
 * With `optional` set the property sits in the optional list, where VERSION
 * is a structural error.
 */
export function validateProperty(prop: PropertyShape | null | undefined, optional: boolean): Result {
  if (!prop) return fail('InvalidProperty', 'Missing property');

  const { name, group, parameters, values } = prop;
  if (name == null || group == null || parameters == null || values == null) {
    return fail('InvalidProperty', 'Property is missing its name, group, parameters or values', name ?? undefined);
  }
  if (name.length === 0) {
    return fail('InvalidProperty', 'Empty property name');
  }

  const upper = name.toUpperCase();
  if (optional && upper === 'VERSION') {
    return fail('InvalidCardStructure', 'VERSION may not appear as an optional property', name);
  }
  if (!isKnownPropertyName(name)) {
    return fail('InvalidProperty', `Unknown property name: ${name}`, name);
  }

  for (const param of parameters) {
    if (!param?.name || !param.value) {
      return fail('InvalidProperty', `Empty parameter name or value on ${name}`, name);
    }
  }

  if (values.length === 0) {
    return fail('InvalidProperty', `${name} has no value`, name);
  }
  if (upper === 'N' && values.length !== N_FIELD_COUNT) {
    return fail('InvalidProperty', `N must have exactly ${N_FIELD_COUNT} fields, got ${values.length}`, name);
  }
  // Empty strings are fine; missing entries are not
  if (values.some(v => v == null)) {
    return fail('InvalidProperty', `${name} has a missing value entry`, name);
  }

  return PASS;
}

/** Validate a BDAY/ANNIVERSARY value; absence is not an error */
export function validateDateTime(dt: DateTime | null | undefined, property?: string): Result {
  if (!dt) return PASS;

  if (dt.isText) {
    if (dt.text.length === 0) {
      return fail('InvalidDateTime', 'Text date value is empty', property);
    }
    return PASS;
  }

  if (dt.date.length === 0 && dt.time.length === 0) {
    return fail('InvalidDateTime', 'Date value has neither date nor time', property);
  }
  if (dt.date.length > 0 && dt.date.length !== DATE_LENGTH) {
    return fail('InvalidDateTime', `Date must be YYYYMMDD, got "${dt.date}"`, property);
  }
  if (dt.time.length > 0 && dt.time.length !== TIME_LENGTH) {
    return fail('InvalidDateTime', `Time must be HHMMSS, got "${dt.time}"`, property);
  }
  return PASS;
}

/**
 * Validate a whole card.
 *
 *   1. card and FN present
 *   2. FN is a valid property
 *   3. optional property list present
 *   4. each optional property: no BDAY/ANNIVERSARY, no VERSION, valid, at most one N
 *   5. birthday, then anniversary
 */
export function validateCard(card: CardShape | null | undefined): Result {
  if (!card) return fail('InvalidCardStructure', 'Missing card');
  if (!card.fn) return fail('InvalidCardStructure', 'Missing required property: FN', 'FN');

  const fnResult = validateProperty(card.fn, false);
  if (!fnResult.ok) return fnResult;

  if (!card.optionalProperties) {
    return fail('InvalidCardStructure', 'Missing optional property list');
  }

  let seenN = false;
  for (const prop of card.optionalProperties) {
    const upper = prop.name?.toUpperCase();
    if (upper === 'BDAY' || upper === 'ANNIVERSARY') {
      return fail('InvalidDateTime', `${upper} may not appear as an optional property`, upper);
    }

    const propResult = validateProperty(prop, true);
    if (!propResult.ok) return propResult;

    if (upper === 'N') {
      if (seenN) return fail('InvalidProperty', 'N may appear at most once', 'N');
      seenN = true;
    }
  }

  const bday = validateDateTime(card.birthday, 'BDAY');
  if (!bday.ok) return bday;

  return validateDateTime(card.anniversary, 'ANNIVERSARY');
}
