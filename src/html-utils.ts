/**
 * Escape a string for use as HTML text content.
 *
 * Implementation detail: only `&`, `<` and `>` are encoded. Text is only ever
 * rendered in the data or RCDATA states, where these are the only characters
 * with a special meaning (`>` is encoded for symmetry).
 *
 * @see https://html.spec.whatwg.org/multipage/parsing.html#data-state
 * @see https://html.spec.whatwg.org/multipage/parsing.html#rcdata-state
 *
 * @param str The string to escape.
 * @returns The escaped string.
 *
 * @example
 * ```ts
 * escapeText('5 > 3 & 2 < 4');
 * // '5 &gt; 3 &amp; 2 &lt; 4'
 * ```
 */
export function escapeText (str: string): string {
  const map: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
  };
  return str.replace(/[&<>]/g, (ch) => map[ch] ?? ch);
}

/**
 * Make a string safe for use as the text of an HTML comment.
 *
 * A comment must not start with `>` or `->`, must not contain `<!--`, `-->`
 * or `--!>` and must not end with `<!-`. The forbidden sequences are mangled
 * (`-` becomes `=`), so the result is not reversible.
 *
 * @see https://html.spec.whatwg.org/multipage/syntax.html#comments
 *
 * @param str The comment text.
 * @returns Text that can be placed between `<!--` and `-->`.
 *
 * @example
 * ```ts
 * escapeComment('a --> b');
 * // 'a ==> b'
 * ```
 */
export function escapeComment (str: string): string {
  let s = str
    .split('<!--').join('<!==')
    .split('-->').join('==>')
    .split('--!>').join('==!>');

  if (s.startsWith('>') || s.startsWith('->')) s = ' ' + s;
  if (s.endsWith('<!-')) s = s + ' ';
  return s;
}

/**
 * Escape a string for use inside a double-quoted attribute value.
 *
 * Only `"` needs encoding there; `&` and `<` pass through unchanged.
 *
 * @see https://html.spec.whatwg.org/multipage/syntax.html#attributes-2
 *
 * @param str The attribute value.
 * @returns The escaped value, without the surrounding quotes.
 */
export function escapeAttributeValue (str: string): string {
  return str.replace(/"/g, '&quot;');
}
