/**
 * Constructors for all non-deprecated HTML elements.
 *
 * Names that are reserved words in JavaScript carry a trailing underscore
 * (`var_`).
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element
 */

import { elementFactory } from './element.js';

// Main root
export const html = elementFactory('html');

// Document metadata
export const base = elementFactory('base', 'void');
export const head = elementFactory('head');
export const link = elementFactory('link', 'void');
export const meta = elementFactory('meta', 'void');
export const style = elementFactory('style', 'raw-text');
export const title = elementFactory('title', 'escapable-raw-text');

// Sectioning root
export const body = elementFactory('body');

// Content sectioning
export const address = elementFactory('address');
export const article = elementFactory('article');
export const aside = elementFactory('aside');
export const footer = elementFactory('footer');
export const header = elementFactory('header');
export const h1 = elementFactory('h1');
export const h2 = elementFactory('h2');
export const h3 = elementFactory('h3');
export const h4 = elementFactory('h4');
export const h5 = elementFactory('h5');
export const h6 = elementFactory('h6');
export const hgroup = elementFactory('hgroup');
export const main = elementFactory('main');
export const nav = elementFactory('nav');
export const section = elementFactory('section');
export const search = elementFactory('search');

// Text content
export const blockquote = elementFactory('blockquote');
export const dd = elementFactory('dd');
export const div = elementFactory('div');
export const dl = elementFactory('dl');
export const dt = elementFactory('dt');
export const figcaption = elementFactory('figcaption');
export const figure = elementFactory('figure');
export const hr = elementFactory('hr', 'void');
export const li = elementFactory('li');
export const menu = elementFactory('menu');
export const ol = elementFactory('ol');
export const p = elementFactory('p');
export const pre = elementFactory('pre');
export const ul = elementFactory('ul');

// Inline text semantics
export const a = elementFactory('a');
export const abbr = elementFactory('abbr');
export const b = elementFactory('b');
export const bdi = elementFactory('bdi');
export const bdo = elementFactory('bdo');
export const br = elementFactory('br', 'void');
export const cite = elementFactory('cite');
export const code = elementFactory('code');
export const data = elementFactory('data');
export const dfn = elementFactory('dfn');
export const em = elementFactory('em');
export const i = elementFactory('i');
export const kbd = elementFactory('kbd');
export const mark = elementFactory('mark');
export const q = elementFactory('q');
export const rp = elementFactory('rp');
export const rt = elementFactory('rt');
export const ruby = elementFactory('ruby');
export const s = elementFactory('s');
export const samp = elementFactory('samp');
export const small = elementFactory('small');
export const span = elementFactory('span');
export const strong = elementFactory('strong');
export const sub = elementFactory('sub');
export const sup = elementFactory('sup');
export const time = elementFactory('time');
export const u = elementFactory('u');
export const var_ = elementFactory('var');
export const wbr = elementFactory('wbr', 'void');

// Image and multimedia
export const area = elementFactory('area', 'void');
export const audio = elementFactory('audio');
export const img = elementFactory('img', 'void');
export const map = elementFactory('map');
export const track = elementFactory('track', 'void');
export const video = elementFactory('video');

// Embedded content
export const embed = elementFactory('embed', 'void');
export const fencedframe = elementFactory('fencedframe');
export const iframe = elementFactory('iframe');
export const object = elementFactory('object');
export const picture = elementFactory('picture');
export const portal = elementFactory('portal');
export const source = elementFactory('source', 'void');

// SVG and MathML roots; see the svg and mathml catalogs for their children
export const svg = elementFactory('svg', 'foreign');
export const math = elementFactory('math', 'foreign');

// Scripting
export const canvas = elementFactory('canvas');
export const noscript = elementFactory('noscript');
export const script = elementFactory('script', 'raw-text');

// Demarcating edits
export const del = elementFactory('del');
export const ins = elementFactory('ins');

// Table content
export const caption = elementFactory('caption');
export const col = elementFactory('col', 'void');
export const colgroup = elementFactory('colgroup');
export const table = elementFactory('table');
export const tbody = elementFactory('tbody');
export const td = elementFactory('td');
export const tfoot = elementFactory('tfoot');
export const th = elementFactory('th');
export const thead = elementFactory('thead');
export const tr = elementFactory('tr');

// Forms
export const button = elementFactory('button');
export const datalist = elementFactory('datalist');
export const fieldset = elementFactory('fieldset');
export const form = elementFactory('form');
export const input = elementFactory('input', 'void');
export const label = elementFactory('label');
export const legend = elementFactory('legend');
export const meter = elementFactory('meter');
export const optgroup = elementFactory('optgroup');
export const option = elementFactory('option');
export const output = elementFactory('output');
export const progress = elementFactory('progress');
export const select = elementFactory('select');
export const textarea = elementFactory('textarea', 'escapable-raw-text');

// Interactive elements
export const details = elementFactory('details');
export const dialog = elementFactory('dialog');
export const summary = elementFactory('summary');

// Web Components
export const slot = elementFactory('slot');
export const template = elementFactory('template', 'template');

// Obsolete and deprecated elements are intentionally left out.
