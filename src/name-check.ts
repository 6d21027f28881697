/**
 * Checks for names and raw text that the renderer relies on.
 *
 * The HTML rules for valid tag and attribute names are complicated and the
 * standard does not give a short answer, so the checks here are conservative:
 * whatever passes should parse the same way in every conforming parser.
 */

/**
 * Characters that may follow `</tagname` to form an end tag.
 * TAB, LF, FF, CR, SPACE, `>` and `/`.
 */
const END_TAG_FOLLOWERS = new Set([ '\t', '\n', '\f', '\r', ' ', '>', '/' ]);

/**
 * ASCII-only lowercase; leaves every other character untouched.
 *
 * @param s - Input string.
 * @returns String with `A-Z` mapped to `a-z`.
 */
export const asciiLower = (s: string): string => s.replace(/[A-Z]/g, (ch) => String.fromCharCode(ch.charCodeAt(0) + 32));

/**
 * Checks whether a tag name is valid: an ASCII letter followed by ASCII
 * letters or digits.
 *
 * @see https://html.spec.whatwg.org/multipage/syntax.html#syntax-tag-name
 *
 * @param name - Tag name.
 * @returns True if the name may be rendered.
 */
export const isValidTagName = (name: string): boolean => /^[A-Za-z][A-Za-z0-9]*$/.test(name);

/**
 * Checks whether an attribute name is valid: an ASCII letter followed by
 * ASCII letters, digits, `-` or `_`.
 *
 * @see https://html.spec.whatwg.org/multipage/syntax.html#syntax-attribute-name
 *
 * @param name - Attribute name.
 * @returns True if the name may be rendered.
 */
export const isValidAttributeName = (name: string): boolean => /^[A-Za-z][A-Za-z0-9_-]*$/.test(name);

/**
 * Checks whether text may be placed unescaped inside a raw text element.
 *
 * The text must not contain `</` followed by the element's tag name
 * (ASCII case-insensitive) followed by whitespace, `>` or `/`, since a parser
 * would read that as the element's end tag.
 *
 * A `</tagname` that runs up to the very end of the text is accepted.
 *
 * @see https://html.spec.whatwg.org/multipage/syntax.html#cdata-rcdata-restrictions
 *
 * @param tagName - Tag name of the containing element. Must be ASCII.
 * @param text - Text content.
 * @returns True if the text cannot close the element early.
 */
export const isValidRawText = (tagName: string, text: string): boolean => {
  if (!/^[\x00-\x7f]*$/.test(tagName)) {
    throw new TypeError(`Tag name must be ASCII: ${JSON.stringify(tagName)}`);
  }

  const wanted = asciiLower(tagName);
  let idx = text.indexOf('</');
  while (idx !== -1) {
    const start = idx + 2;
    // A matching candidate is ASCII, so UTF-16 units and characters line up.
    const candidate = text.slice(start, start + tagName.length);
    if (asciiLower(candidate) === wanted) {
      const trailing = text.charAt(start + tagName.length);
      if (trailing !== '' && END_TAG_FOLLOWERS.has(trailing)) return false;
    }
    idx = text.indexOf('</', start);
  }
  return true;
};
