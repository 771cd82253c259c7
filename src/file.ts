/**
 * Reading and writing .vcf files.
 *
 * Thin synchronous wrappers: the file is read or written in one call and no
 * handle outlives it.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { extname } from 'node:path';

import type { ParseOptions, WriteOptions } from './types.js';
import { fail, fromException, PASS, type Result } from './errors.js';
import { validateCard } from './validator.js';
import { serializeCard } from './generator.js';
import { VCard } from './vcard.js';

const CARD_EXTENSIONS: ReadonlySet<string> = new Set(['.vcf', '.vcard']);

/** Whether `fileName` ends in .vcf or .vcard (case-insensitive) */
export function hasCardExtension(fileName: string): boolean {
  return CARD_EXTENSIONS.has(extname(fileName).toLowerCase());
}

/**
 * Read and parse the card stored at `fileName`.
 * The file is decoded as UTF-8: bytes that are not valid UTF-8 become
 * U+FFFD, so `writeCard` does not reproduce them.
 */
export function createCard(fileName: string, options?: ParseOptions): Result<VCard> {
  if (!fileName || !hasCardExtension(fileName)) {
    return fail('InvalidInputSource', `Not a .vcf or .vcard file: "${fileName}"`);
  }

  let text: string;
  try {
    text = readFileSync(fileName, 'utf8');
  } catch (err) {
    if (err instanceof RangeError) return fromException(err);
    const reason = err instanceof Error ? err.message : String(err);
    return fail('InvalidInputSource', `Cannot read ${fileName}: ${reason}`);
  }

  return VCard.fromText(text, options);
}

/**
 * Write `card` to `fileName`, replacing any existing file.
 * The card is validated first unless `validate: false` is given.
 */
export function writeCard(fileName: string, card: VCard, options: WriteOptions = {}): Result {
  if (!fileName) return fail('WriteFailure', 'Missing file name');

  if (options.validate !== false) {
    const valid = validateCard(card);
    if (!valid.ok) return valid;
  }

  try {
    writeFileSync(fileName, serializeCard(card), 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return fail('WriteFailure', `Cannot write ${fileName}: ${reason}`);
  }
  return PASS;
}
