import { JSDOM } from 'jsdom';

/**
 * Parse rendered HTML with a standards-compliant parser.
 *
 * @param html - Full document or fragment; fragments end up in `<body>`.
 * @returns The parsed document.
 */
export function parseHtml (html: string): Document {
  return new JSDOM(html).window.document;
}

/**
 * Random string from a set of characters that matter for escaping.
 *
 * @param len - Length.
 * @param chars - Character set to draw from.
 */
export function randStr (len: number, chars = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789<>&"\'/!-=_ \n\täöü€'): string {
  let s = '';
  for (let i = 0; i < len; i++) s += chars[Math.floor(Math.random() * chars.length)];
  return s;
}
