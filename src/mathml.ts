/**
 * Constructors for all non-deprecated MathML elements (foreign elements).
 *
 * `annotation-xml` is not included since the tag name check rejects `-`.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/MathML/Element
 */

import { elementFactory } from './element.js';

export const annotation = elementFactory('annotation', 'foreign');
export const math = elementFactory('math', 'foreign');
export const merror = elementFactory('merror', 'foreign');
export const mfrac = elementFactory('mfrac', 'foreign');
export const mi = elementFactory('mi', 'foreign');
export const mmultiscripts = elementFactory('mmultiscripts', 'foreign');
export const mn = elementFactory('mn', 'foreign');
export const mo = elementFactory('mo', 'foreign');
export const mover = elementFactory('mover', 'foreign');
export const mpadded = elementFactory('mpadded', 'foreign');
export const mphantom = elementFactory('mphantom', 'foreign');
export const mprescripts = elementFactory('mprescripts', 'foreign');
export const mroot = elementFactory('mroot', 'foreign');
export const mrow = elementFactory('mrow', 'foreign');
export const ms = elementFactory('ms', 'foreign');
export const mspace = elementFactory('mspace', 'foreign');
export const msqrt = elementFactory('msqrt', 'foreign');
export const mstyle = elementFactory('mstyle', 'foreign');
export const msub = elementFactory('msub', 'foreign');
export const msubsup = elementFactory('msubsup', 'foreign');
export const msup = elementFactory('msup', 'foreign');
export const mtable = elementFactory('mtable', 'foreign');
export const mtd = elementFactory('mtd', 'foreign');
export const mtext = elementFactory('mtext', 'foreign');
export const mtr = elementFactory('mtr', 'foreign');
export const munder = elementFactory('munder', 'foreign');
export const munderover = elementFactory('munderover', 'foreign');
export const semantics = elementFactory('semantics', 'foreign');
