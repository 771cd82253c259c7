/**
 * Low-level splitting and quoting helpers for content lines.
 *
 * Values are stored exactly as written: no backslash unescaping happens on
 * input and none is added on output. Double quotes only matter inside the
 * name/parameter half of a line, where they shield `;` and `:`.
 */

/**
 * Index of the first `:` that is not inside a double-quoted parameter
 * value, or -1. When a quote is never closed the first `:` is used.
 */
export function findValueColon(line: string): number {
  let inQuotes = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') inQuotes = !inQuotes;
    else if (ch === ':' && !inQuotes) return i;
  }
  return inQuotes ? line.indexOf(':') : -1;
}

/**
 * Split a name/parameter string on `;`, skipping quoted sections.
 * Empty segments are kept so that `NAME;;X=1` is seen as malformed.
 */
export function splitParamString(s: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;
  for (const ch of s) {
    if (ch === '"') {
      inQuotes = !inQuotes;
      current += ch;
    } else if (ch === ';' && !inQuotes) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

/**
 * Split a compound (N, ADR) value into its fields.
 * Each field is trimmed; empty fields are preserved.
 */
export function splitCompound(value: string): string[] {
  return value.split(';').map(field => field.trim());
}

/** Parameter values containing `,` or `;` must be quoted */
export function needsParamQuoting(value: string): boolean {
  return /[,;]/.test(value);
}

/**
 * Quote a parameter value if necessary.
 * A value that already carries a `"` is left untouched.
 */
export function quoteParamValue(value: string): string {
  if (!needsParamQuoting(value) || value.includes('"')) return value;
  return `"${value}"`;
}

/** Remove one pair of surrounding double quotes, if present */
export function unquoteParamValue(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}
