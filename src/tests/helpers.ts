/**
 * Shared test helpers
 */

import assert from 'node:assert/strict';

import type { Result, VCardError, VCardErrorCode } from '../index.js';

/** Join lines with CRLF, terminating the last one too */
export function crlf(lines: string[]): string {
  return lines.map(l => l + '\r\n').join('');
}

/** Wrap body lines in BEGIN / VERSION / END */
export function card(body: string[]): string {
  return crlf(['BEGIN:VCARD', 'VERSION:4.0', ...body, 'END:VCARD']);
}

export function expectOk<T>(result: Result<T>): T {
  if (!result.ok) assert.fail(`expected success, got ${result.error.code}: ${result.error.message}`);
  return result.value;
}

export function expectError<T>(result: Result<T>, code: VCardErrorCode): VCardError {
  if (result.ok) assert.fail(`expected ${code}, got success`);
  assert.equal(result.error.code, code, result.error.message);
  return result.error;
}
