/**
 * Text escaping and unescaping for iCalendar (RFC 5545 section 3.3.11)
 *
 * In TEXT value types:
 *   \\ → \
 *   \n or \N → newline (U+000A)
 *   \, → ,
 *   \; → ;
 *
 * On output, these characters must be escaped:
 *   \ → \\
 *   newline (LF or CRLF) → \n
 *   , → \,
 *   ; → \;
 */

/** Unescape a TEXT value */
export function unescapeText(s: string): string {
  return s.replace(/\\(\\|n|N|,|;)/g, (_, c: string) => {
    if (c === 'n' || c === 'N') return '\n';
    return c;
  });
}

/** Escape a TEXT value */
export function escapeText(s: string): string {
  return s
    .replace(/\\/g, '\\\\')
    .replace(/\r?\n/g, '\\n')
    .replace(/,/g, '\\,')
    .replace(/;/g, '\\;');
}

/**
 * Check whether a parameter value needs quoting (RFC 5545 section 3.2).
 * Param values containing `:`, `;`, or `,` must be quoted.
 */
export function needsParamQuoting(value: string): boolean {
  return /[;:,"]/.test(value);
}

/**
 * Quote a parameter value if necessary.
 * RFC 5545 has no escape for DQUOTE inside a quoted value, so any
 * double-quote is replaced by a single quote.
 */
export function quoteParamValue(value: string): string {
  if (!needsParamQuoting(value)) return value;
  return '"' + value.replace(/"/g, "'") + '"';
}
