/**
 * Logical line reader — RFC 6350 §3.2
 *
 * Strict on input:
 *   - every physical line ends in CRLF (a bare LF is malformed; a CR
 *     elsewhere in the line is content)
 *   - a line starting with one space or tab continues the previous one
 *   - logical lines are bounded by `maxLineLength`
 */

import type { ParseOptions } from './types.js';

/** Default logical line bound: a 1000-octet line buffer minus its CRLF */
export const DEFAULT_MAX_LINE_LENGTH = 998;

export type ReadResult =
  | { kind: 'line'; text: string; lineNumber: number }
  | { kind: 'end' }
  | { kind: 'malformed'; lineNumber: number };

interface PhysicalLine {
  content: string;
  /** Offset just past the CRLF */
  next: number;
  terminated: boolean;
}

/**
 * Reads one unfolded line at a time from in-memory text.
 *
 * The reader owns its position; a physical line that is peeked at and found
 * not to be a continuation is left for the next call.
 */
export class LineReader {
  readonly maxLineLength: number;
  private pos = 0;
  private physicalLine = 0;

  constructor(
    private readonly input: string,
    options: ParseOptions = {},
  ) {
    this.maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
  }

  /** Whether all input has been consumed */
  get done(): boolean {
    return this.pos >= this.input.length;
  }

  /** 1-based number of the last physical line consumed */
  get lineNumber(): number {
    return this.physicalLine;
  }

  readLogicalLine(): ReadResult {
    if (this.done) return { kind: 'end' };

    const first = this.peekPhysical(this.pos);
    const lineNumber = this.physicalLine + 1;
    if (!first.terminated || first.content.length > this.maxLineLength) {
      this.pos = this.input.length;
      return { kind: 'malformed', lineNumber };
    }
    this.pos = first.next;
    this.physicalLine = lineNumber;

    let text = first.content;
    while (!this.done && isContinuation(this.input[this.pos])) {
      const cont = this.peekPhysical(this.pos);
      if (!cont.terminated) {
        this.pos = this.input.length;
        return { kind: 'malformed', lineNumber: this.physicalLine + 1 };
      }
      const segment = cont.content.slice(1);
      if (text.length + segment.length > this.maxLineLength) break;
      text += segment;
      this.pos = cont.next;
      this.physicalLine++;
    }

    return { kind: 'line', text, lineNumber };
  }

  /** Read every remaining logical line (stops at the first malformed one) */
  *lines(): Generator<Exclude<ReadResult, { kind: 'end' }>> {
    for (;;) {
      const result = this.readLogicalLine();
      if (result.kind === 'end') return;
      yield result;
      if (result.kind === 'malformed') return;
    }
  }

  private peekPhysical(from: number): PhysicalLine {
    const lf = this.input.indexOf('\n', from);
    if (lf === -1) {
      return { content: this.input.slice(from), next: this.input.length, terminated: false };
    }
    const terminated = lf > from && this.input[lf - 1] === '\r';
    const content = this.input.slice(from, terminated ? lf - 1 : lf);
    return { content, next: lf + 1, terminated };
  }
}

function isContinuation(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t';
}

/**
 * Split CRLF text into unfolded logical lines.
 * Returns null if any physical line is malformed.
 */
export function unfoldLines(input: string, options?: ParseOptions): string[] | null {
  const reader = new LineReader(input, options);
  const out: string[] = [];
  for (const result of reader.lines()) {
    if (result.kind === 'malformed') return null;
    out.push(result.text);
  }
  return out;
}
