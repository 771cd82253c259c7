/**
 * Core type definitions for vCard v4 cards
 */

// ── Parameters ─────────────────────────────────────────────────────────────

/**
 * A `KEY=VALUE` modifier attached to a property (e.g. `VALUE=text`).
 * Both halves are non-empty once trimmed. Quotes around the value are kept
 * as written.
 */
export interface Parameter {
  name: string;
  value: string;
}

// ── Date / time ────────────────────────────────────────────────────────────

/** Free-form BDAY/ANNIVERSARY value, written with `VALUE=text` */
export interface TextDateTime {
  readonly isText: true;
  text: string;
}

/**
 * Structured BDAY/ANNIVERSARY value.
 * `date` is `YYYYMMDD` or empty, `time` is `HHMMSS` or empty; one of them
 * must be set. Shapes are only enforced by the validator.
 */
export interface StructuredDateTime {
  readonly isText: false;
  date: string;
  time: string;
  utc: boolean;
}

/** Tagged date/time-or-text value used by BDAY and ANNIVERSARY */
export type DateTime = TextDateTime | StructuredDateTime;

// ── Loose shapes (validator input) ─────────────────────────────────────────

/**
 * Structural view of a property as the validator sees it. Anything built by
 * this library satisfies it; hand-assembled objects may leave parts out and
 * are rejected instead of crashing the validator.
 */
export interface PropertyShape {
  name?: string | null;
  group?: string | null;
  parameters?: readonly (Partial<Parameter> | null | undefined)[] | null;
  values?: readonly (string | null | undefined)[] | null;
}

/** Structural view of a card as the validator sees it */
export interface CardShape {
  fn?: PropertyShape | null;
  optionalProperties?: readonly PropertyShape[] | null;
  birthday?: DateTime | null;
  anniversary?: DateTime | null;
}

// ── Options ────────────────────────────────────────────────────────────────

export interface ParseOptions {
  /**
   * Maximum length of one logical (unfolded) line, without its CRLF.
   * Longer physical lines are rejected; folding stops short of it.
   * Default: 998
   */
  maxLineLength?: number;
}

export interface GenerateOptions {
  /**
   * Whether to validate the card before generating.
   * Default: true
   */
  validate?: boolean;
}

/** Options for writing a card to disk */
export type WriteOptions = GenerateOptions;

// ── Diagnostics ────────────────────────────────────────────────────────────

/** Non-fatal observation made while parsing */
export interface ParseWarning {
  line?: number;
  message: string;
}
