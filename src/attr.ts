/**
 * Constructors for common HTML attributes.
 *
 * Deprecated or redundant attributes are not included. Attributes taking a
 * fixed set of keywords accept a string literal union; everything else
 * accepts any value and stringifies it.
 *
 * Names that are reserved words get a trailing underscore (`class_`,
 * `default_`, `for_`).
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes
 */

import type {
  Attr,
} from './types.js';

import {
  attr,
} from './element.js';

export {
  dataX,
} from './element.js';

type AttrValue = string | number;

/**
 * Create (or append to) the `accept` attribute, comma separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/accept
 */
export const accept = (value: AttrValue): Attr => attr.append('accept', value, ', ');

/**
 * Create (or append to) the `accesskey` attribute, space separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/accesskey
 */
export const accesskey = (value: AttrValue): Attr => attr.append('accesskey', value, ' ');

/**
 * Create (or replace) the `action` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/form#action
 */
export const action = (value: AttrValue): Attr => attr.set('action', value);

/**
 * Create (or append to) the `allow` attribute, semicolon separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/iframe#allow
 */
export const allow = (value: AttrValue): Attr => attr.append('allow', value, '; ');

/**
 * Create (or replace) the `alt` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/area#alt
 */
export const alt = (value: AttrValue): Attr => attr.set('alt', value);

/**
 * Values of the `as` attribute.
 */
export type As =
  | 'audio'
  | 'document'
  | 'embed'
  | 'fetch'
  | 'font'
  | 'image'
  | 'object'
  | 'script'
  | 'style'
  | 'track'
  | 'video'
  | 'worker';

/**
 * Create (or replace) the `as` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/link#as
 */
export const as = (value: As): Attr => attr.set('as', value);

/**
 * Create (or replace) the boolean `async` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/script#async
 */
export const async = (): Attr => attr.yes('async');

/**
 * Values of the `autocapitalize` attribute.
 */
export type Autocapitalize =
  | 'none'
  | 'sentences'
  | 'words'
  | 'characters';

/**
 * Create (or replace) the `autocapitalize` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/autocapitalize
 */
export const autocapitalize = (value: Autocapitalize): Attr => attr.set('autocapitalize', value);

/**
 * Create (or append to) the `autocomplete` attribute, space separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/autocomplete
 */
export const autocomplete = (value: AttrValue): Attr => attr.append('autocomplete', value, ' ');

/**
 * Create (or replace) the boolean `autofocus` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/autofocus
 */
export const autofocus = (): Attr => attr.yes('autofocus');

/**
 * Create (or replace) the boolean `autoplay` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/audio#autoplay
 */
export const autoplay = (): Attr => attr.yes('autoplay');

/**
 * Values of the `capture` attribute.
 */
export type Capture =
  | 'user'
  | 'environment';

/**
 * Create (or replace) the `capture` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/capture
 */
export const capture = (value: Capture): Attr => attr.set('capture', value);

/**
 * Create (or replace) the boolean `checked` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/input#checked
 */
export const checked = (): Attr => attr.yes('checked');

/**
 * Create (or replace) the `cite` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/blockquote#cite
 */
export const cite = (value: AttrValue): Attr => attr.set('cite', value);

/**
 * Create (or append to) the `class` attribute, space separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/class
 */
export const class_ = (value: AttrValue): Attr => attr.append('class', value, ' ');

/**
 * Create (or replace) the `cols` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/textarea#cols
 */
export const cols = (value: AttrValue): Attr => attr.set('cols', value);

/**
 * Create (or replace) the `colspan` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/td#colspan
 */
export const colspan = (value: AttrValue): Attr => attr.set('colspan', value);

/**
 * Create (or replace) the `content` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/meta#content
 */
export const content = (value: AttrValue): Attr => attr.set('content', value);

/**
 * Values of the `contenteditable` attribute.
 */
export type Contenteditable =
  | 'true'
  | 'false'
  | 'plaintext-only';

const contenteditableValues: Record<Contenteditable, string> = {
  true: '',
  false: 'false',
  'plaintext-only': 'plaintext-only',
};

/**
 * Create (or replace) the `contenteditable` attribute. `true` renders as the bare attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/contenteditable
 */
export const contenteditable = (value: Contenteditable): Attr => attr.set('contenteditable', contenteditableValues[value]);

/**
 * Create (or replace) the boolean `controls` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/audio#controls
 */
export const controls = (): Attr => attr.yes('controls');

/**
 * Create (or replace) the `coords` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/area#coords
 */
export const coords = (value: AttrValue): Attr => attr.set('coords', value);

/**
 * Values of the `crossorigin` attribute.
 */
export type Crossorigin =
  | 'anonymous'
  | 'use-credentials';

/**
 * Create (or replace) the `crossorigin` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/crossorigin
 */
export const crossorigin = (value: Crossorigin): Attr => attr.set('crossorigin', value);

/**
 * Create (or replace) the `data` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/object#data
 */
export const data = (value: AttrValue): Attr => attr.set('data', value);

/**
 * Create (or replace) the `datetime` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/del#datetime
 */
export const datetime = (value: AttrValue): Attr => attr.set('datetime', value);

/**
 * Values of the `decoding` attribute.
 */
export type Decoding =
  | 'sync'
  | 'async'
  | 'auto';

/**
 * Create (or replace) the `decoding` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/img#decoding
 */
export const decoding = (value: Decoding): Attr => attr.set('decoding', value);

/**
 * Create (or replace) the boolean `default` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/track#default
 */
export const default_ = (): Attr => attr.yes('default');

/**
 * Create (or replace) the boolean `defer` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/script#defer
 */
export const defer = (): Attr => attr.yes('defer');

/**
 * Values of the `dir` attribute.
 */
export type Dir =
  | 'ltr'
  | 'rtl'
  | 'auto';

/**
 * Create (or replace) the `dir` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/dir
 */
export const dir = (value: Dir): Attr => attr.set('dir', value);

/**
 * Create (or replace) the `dirname` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/dirname
 */
export const dirname = (value: AttrValue): Attr => attr.set('dirname', value);

/**
 * Create (or replace) the boolean `disabled` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/disabled
 */
export const disabled = (): Attr => attr.yes('disabled');

/**
 * Create (or replace) the `download` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/a#download
 */
export const download = (value: AttrValue): Attr => attr.set('download', value);

/**
 * Values of the `draggable` attribute.
 */
export type Draggable =
  | 'true'
  | 'false';

/**
 * Create (or replace) the `draggable` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/draggable
 */
export const draggable = (value: Draggable): Attr => attr.set('draggable', value);

/**
 * Values of the `enctype` attribute.
 */
export type Enctype =
  | 'application/x-www-form-urlencoded'
  | 'multipart/form-data'
  | 'text/plain';

/**
 * Create (or replace) the `enctype` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/form#enctype
 */
export const enctype = (value: Enctype): Attr => attr.set('enctype', value);

/**
 * Values of the `enterkeyhint` attribute.
 */
export type Enterkeyhint =
  | 'enter'
  | 'done'
  | 'go'
  | 'next'
  | 'previous'
  | 'search'
  | 'send';

/**
 * Create (or replace) the `enterkeyhint` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/enterkeyhint
 */
export const enterkeyhint = (value: Enterkeyhint): Attr => attr.set('enterkeyhint', value);

/**
 * Create (or append to) the `exportparts` attribute, comma separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/exportparts
 */
export const exportparts = (value: AttrValue): Attr => attr.append('exportparts', value, ', ');

/**
 * Create (or replace) the `for` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/for
 */
export const for_ = (value: AttrValue): Attr => attr.set('for', value);

/**
 * Create (or replace) the `form` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/button#form
 */
export const form = (value: AttrValue): Attr => attr.set('form', value);

/**
 * Create (or replace) the `formaction` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/button#formaction
 */
export const formaction = (value: AttrValue): Attr => attr.set('formaction', value);

/**
 * Values of the `formenctype` attribute.
 */
export type Formenctype =
  | 'application/x-www-form-urlencoded'
  | 'multipart/form-data'
  | 'text/plain';

/**
 * Create (or replace) the `formenctype` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/button#formenctype
 */
export const formenctype = (value: Formenctype): Attr => attr.set('formenctype', value);

/**
 * Values of the `formmethod` attribute.
 */
export type Formmethod =
  | 'post'
  | 'get'
  | 'dialog';

/**
 * Create (or replace) the `formmethod` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/button#formmethod
 */
export const formmethod = (value: Formmethod): Attr => attr.set('formmethod', value);

/**
 * Create (or replace) the boolean `formnovalidate` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/button#formnovalidate
 */
export const formnovalidate = (): Attr => attr.yes('formnovalidate');

/**
 * Values of the `formtarget` attribute.
 */
export type Formtarget =
  | '_self'
  | '_blank'
  | '_parent'
  | '_top';

/**
 * Create (or replace) the `formtarget` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/button#formtarget
 */
export const formtarget = (value: Formtarget): Attr => attr.set('formtarget', value);

/**
 * Create (or append to) the `headers` attribute, space separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/td#headers
 */
export const headers = (value: AttrValue): Attr => attr.append('headers', value, ' ');

/**
 * Create (or replace) the `height` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/canvas#height
 */
export const height = (value: AttrValue): Attr => attr.set('height', value);

/**
 * Values of the `hidden` attribute.
 */
export type Hidden =
  | 'yes'
  | 'until-found';

const hiddenValues: Record<Hidden, string> = {
  yes: '',
  'until-found': 'until-found',
};

/**
 * Create (or replace) the `hidden` attribute. `yes` renders as the bare attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/hidden
 */
export const hidden = (value: Hidden): Attr => attr.set('hidden', hiddenValues[value]);

/**
 * Create (or replace) the `high` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/meter#high
 */
export const high = (value: AttrValue): Attr => attr.set('high', value);

/**
 * Create (or replace) the `href` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/a#href
 */
export const href = (value: AttrValue): Attr => attr.set('href', value);

/**
 * Create (or replace) the `hreflang` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/a#hreflang
 */
export const hreflang = (value: AttrValue): Attr => attr.set('hreflang', value);

/**
 * Values of the `http-equiv` attribute.
 */
export type HttpEquiv =
  | 'content-security-policy'
  | 'content-type'
  | 'default-style'
  | 'x-ua-compatible'
  | 'refresh';

/**
 * Create (or replace) the `http-equiv` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/meta#http-equiv
 */
export const httpEquiv = (value: HttpEquiv): Attr => attr.set('http-equiv', value);

/**
 * Create (or replace) the `id` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/id
 */
export const id = (value: AttrValue): Attr => attr.set('id', value);

/**
 * Create (or replace) the boolean `inert` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/inert
 */
export const inert = (): Attr => attr.yes('inert');

/**
 * Create (or replace) the `integrity` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/link#integrity
 */
export const integrity = (value: AttrValue): Attr => attr.set('integrity', value);

/**
 * Values of the `inputmode` attribute.
 */
export type Inputmode =
  | 'none'
  | 'text'
  | 'decimal'
  | 'numeric'
  | 'tel'
  | 'search'
  | 'email'
  | 'url';

/**
 * Create (or replace) the `inputmode` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/inputmode
 */
export const inputmode = (value: Inputmode): Attr => attr.set('inputmode', value);

/**
 * Create (or replace) the `is` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/is
 */
export const is = (value: AttrValue): Attr => attr.set('is', value);

/**
 * Create (or replace) the boolean `ismap` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/img#ismap
 */
export const ismap = (): Attr => attr.yes('ismap');

/**
 * Create (or replace) the `itemid` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/itemid
 */
export const itemid = (value: AttrValue): Attr => attr.set('itemid', value);

/**
 * Create (or replace) the `itemprop` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/itemprop
 */
export const itemprop = (value: AttrValue): Attr => attr.set('itemprop', value);

/**
 * Create (or replace) the `itemref` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/itemref
 */
export const itemref = (value: AttrValue): Attr => attr.set('itemref', value);

/**
 * Create (or replace) the boolean `itemscope` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/itemscope
 */
export const itemscope = (): Attr => attr.yes('itemscope');

/**
 * Create (or replace) the `itemtype` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/itemtype
 */
export const itemtype = (value: AttrValue): Attr => attr.set('itemtype', value);

/**
 * Values of the `kind` attribute.
 */
export type Kind =
  | 'subtitles'
  | 'captions'
  | 'chapters'
  | 'metadata';

/**
 * Create (or replace) the `kind` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/track#kind
 */
export const kind = (value: Kind): Attr => attr.set('kind', value);

/**
 * Create (or replace) the `lang` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/lang
 */
export const lang = (value: AttrValue): Attr => attr.set('lang', value);

/**
 * Values of the `loading` attribute.
 */
export type Loading =
  | 'eager'
  | 'lazy';

/**
 * Create (or replace) the `loading` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/img#loading
 */
export const loading = (value: Loading): Attr => attr.set('loading', value);

/**
 * Create (or replace) the `list` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/input#list
 */
export const list = (value: AttrValue): Attr => attr.set('list', value);

/**
 * Create (or replace) the boolean `loop` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/audio#loop
 */
export const loop = (): Attr => attr.yes('loop');

/**
 * Create (or replace) the `low` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/meter#low
 */
export const low = (value: AttrValue): Attr => attr.set('low', value);

/**
 * Create (or replace) the `max` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/max
 */
export const max = (value: AttrValue): Attr => attr.set('max', value);

/**
 * Create (or replace) the `maxlength` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/maxlength
 */
export const maxlength = (value: AttrValue): Attr => attr.set('maxlength', value);

/**
 * Create (or replace) the `minlength` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/minlength
 */
export const minlength = (value: AttrValue): Attr => attr.set('minlength', value);

/**
 * Values of the `method` attribute.
 */
export type Method =
  | 'post'
  | 'get'
  | 'dialog';

/**
 * Create (or replace) the `method` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/form#method
 */
export const method = (value: Method): Attr => attr.set('method', value);

/**
 * Create (or replace) the `min` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/min
 */
export const min = (value: AttrValue): Attr => attr.set('min', value);

/**
 * Create (or replace) the boolean `multiple` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/multiple
 */
export const multiple = (): Attr => attr.yes('multiple');

/**
 * Create (or replace) the boolean `muted` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/audio#muted
 */
export const muted = (): Attr => attr.yes('muted');

/**
 * Create (or replace) the `name` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/button#name
 */
export const name = (value: AttrValue): Attr => attr.set('name', value);

/**
 * Create (or replace) the `nonce` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/nonce
 */
export const nonce = (value: AttrValue): Attr => attr.set('nonce', value);

/**
 * Create (or replace) the boolean `novalidate` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/form#novalidate
 */
export const novalidate = (): Attr => attr.yes('novalidate');

/**
 * Create (or replace) the boolean `open` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/details#open
 */
export const open = (): Attr => attr.yes('open');

/**
 * Create (or replace) the `optimum` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/meter#optimum
 */
export const optimum = (value: AttrValue): Attr => attr.set('optimum', value);

/**
 * Create (or append to) the `part` attribute, space separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/part
 */
export const part = (value: AttrValue): Attr => attr.append('part', value, ' ');

/**
 * Create (or replace) the `pattern` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/pattern
 */
export const pattern = (value: AttrValue): Attr => attr.set('pattern', value);

/**
 * Create (or append to) the `ping` attribute, space separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/a#ping
 */
export const ping = (value: AttrValue): Attr => attr.append('ping', value, ' ');

/**
 * Create (or replace) the `placeholder` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/placeholder
 */
export const placeholder = (value: AttrValue): Attr => attr.set('placeholder', value);

/**
 * Create (or replace) the boolean `playsinline` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/video#playsinline
 */
export const playsinline = (): Attr => attr.yes('playsinline');

/**
 * Values of the `popover` attribute.
 */
export type Popover =
  | 'auto'
  | 'manual';

const popoverValues: Record<Popover, string> = {
  auto: '',
  manual: 'manual',
};

/**
 * Create (or replace) the `popover` attribute. `auto` renders as the bare attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/popover
 */
export const popover = (value: Popover): Attr => attr.set('popover', popoverValues[value]);

/**
 * Create (or replace) the `poster` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/video#poster
 */
export const poster = (value: AttrValue): Attr => attr.set('poster', value);

/**
 * Values of the `preload` attribute.
 */
export type Preload =
  | 'none'
  | 'metadata'
  | 'auto';

/**
 * Create (or replace) the `preload` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/audio#preload
 */
export const preload = (value: Preload): Attr => attr.set('preload', value);

/**
 * Create (or replace) the boolean `readonly` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/readonly
 */
export const readonly = (): Attr => attr.yes('readonly');

/**
 * Values of the `referrerpolicy` attribute.
 */
export type Referrerpolicy =
  | 'no-referrer'
  | 'no-referrer-when-downgrade'
  | 'origin'
  | 'origin-when-cross-origin'
  | 'same-origin'
  | 'strict-origin'
  | 'strict-origin-when-cross-origin'
  | 'unsafe-url';

/**
 * Create (or replace) the `referrerpolicy` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/a#referrerpolicy
 */
export const referrerpolicy = (value: Referrerpolicy): Attr => attr.set('referrerpolicy', value);

/**
 * Link types accepted by {@link rel}.
 */
export type Rel =
  | 'alternate'
  | 'author'
  | 'bookmark'
  | 'canonical'
  | 'dns-prefetch'
  | 'external'
  | 'expect'
  | 'help'
  | 'icon'
  | 'license'
  | 'manifest'
  | 'me'
  | 'modulepreload'
  | 'next'
  | 'nofollow'
  | 'noopener'
  | 'noreferrer'
  | 'opener'
  | 'pingback'
  | 'preconnect'
  | 'prefetch'
  | 'preload'
  | 'prerender'
  | 'prev'
  | 'privacy-policy'
  | 'search'
  | 'stylesheet'
  | 'tag'
  | 'terms-of-service';

/**
 * Create (or append to) the `rel` attribute, space separated.
 * Any link type is accepted; the known ones are offered as completions.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/rel
 */
export const rel = (value: Rel | (string & Record<never, never>)): Attr => attr.append('rel', value, ' ');

/**
 * Create (or replace) the boolean `required` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/required
 */
export const required = (): Attr => attr.yes('required');

/**
 * Create (or replace) the boolean `reversed` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/ol#reversed
 */
export const reversed = (): Attr => attr.yes('reversed');

/**
 * Create (or replace) the `rows` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/textarea#rows
 */
export const rows = (value: AttrValue): Attr => attr.set('rows', value);

/**
 * Create (or replace) the `rowspan` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/td#rowspan
 */
export const rowspan = (value: AttrValue): Attr => attr.set('rowspan', value);

/**
 * Create (or append to) the `sandbox` attribute, space separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/iframe#sandbox
 */
export const sandbox = (value: AttrValue): Attr => attr.append('sandbox', value, ' ');

/**
 * Values of the `scope` attribute.
 */
export type Scope =
  | 'row'
  | 'col'
  | 'rowgroup'
  | 'colgroup';

/**
 * Create (or replace) the `scope` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/th#scope
 */
export const scope = (value: Scope): Attr => attr.set('scope', value);

/**
 * Create (or replace) the boolean `selected` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/option#selected
 */
export const selected = (): Attr => attr.yes('selected');

/**
 * Values of the `shape` attribute.
 */
export type Shape =
  | 'rect'
  | 'circle'
  | 'poly'
  | 'default';

/**
 * Create (or replace) the `shape` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/area#shape
 */
export const shape = (value: Shape): Attr => attr.set('shape', value);

/**
 * Create (or replace) the `size` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/size
 */
export const size = (value: AttrValue): Attr => attr.set('size', value);

/**
 * Create (or append to) the `sizes` attribute, comma separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/img#sizes
 */
export const sizes = (value: AttrValue): Attr => attr.append('sizes', value, ', ');

/**
 * Create (or append to) the `sizes` attribute, space separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/link#sizes
 */
export const sizesLink = (value: AttrValue): Attr => attr.append('sizes', value, ' ');

/**
 * Create (or replace) the `slot` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/slot
 */
export const slot = (value: AttrValue): Attr => attr.set('slot', value);

/**
 * Create (or replace) the `span` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/col#span
 */
export const span = (value: AttrValue): Attr => attr.set('span', value);

/**
 * Values of the `spellcheck` attribute.
 */
export type Spellcheck =
  | 'true'
  | 'false';

const spellcheckValues: Record<Spellcheck, string> = {
  true: '',
  false: 'false',
};

/**
 * Create (or replace) the `spellcheck` attribute. `true` renders as the bare attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/spellcheck
 */
export const spellcheck = (value: Spellcheck): Attr => attr.set('spellcheck', spellcheckValues[value]);

/**
 * Create (or replace) the `src` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/audio#src
 */
export const src = (value: AttrValue): Attr => attr.set('src', value);

/**
 * Create (or replace) the `srcdoc` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/iframe#srcdoc
 */
export const srcdoc = (value: AttrValue): Attr => attr.set('srcdoc', value);

/**
 * Create (or replace) the `srclang` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/track#srclang
 */
export const srclang = (value: AttrValue): Attr => attr.set('srclang', value);

/**
 * Create (or append to) the `srcset` attribute, comma separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/img#srcset
 */
export const srcset = (value: AttrValue): Attr => attr.append('srcset', value, ', ');

/**
 * Create (or replace) the `start` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/ol#start
 */
export const start = (value: AttrValue): Attr => attr.set('start', value);

/**
 * Create (or replace) the `step` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Attributes/step
 */
export const step = (value: AttrValue): Attr => attr.set('step', value);

/**
 * Create (or append to) the `style` attribute, semicolon separated.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/style
 */
export const style = (value: AttrValue): Attr => attr.append('style', value, '; ');

/**
 * Create (or replace) the `tabindex` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/tabindex
 */
export const tabindex = (value: AttrValue): Attr => attr.set('tabindex', value);

/**
 * Values of the `target` attribute.
 */
export type Target =
  | '_self'
  | '_blank'
  | '_parent'
  | '_top'
  | '_unfencedTop';

/**
 * Create (or replace) the `target` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/a#target
 */
export const target = (value: Target): Attr => attr.set('target', value);

/**
 * Create (or replace) the `title` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/title
 */
export const title = (value: AttrValue): Attr => attr.set('title', value);

/**
 * Values of the `translate` attribute.
 */
export type Translate =
  | 'yes'
  | 'no';

const translateValues: Record<Translate, string> = {
  yes: '',
  no: 'no',
};

/**
 * Create (or replace) the `translate` attribute. `yes` renders as the bare attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/translate
 */
export const translate = (value: Translate): Attr => attr.set('translate', translateValues[value]);

/**
 * Create (or replace) the `type` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/embed#type
 */
export const type = (value: AttrValue): Attr => attr.set('type', value);

/**
 * Values of the `type` attribute.
 */
export type TypeButton =
  | 'submit'
  | 'reset'
  | 'button';

/**
 * Create (or replace) the `type` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/button#type
 */
export const typeButton = (value: TypeButton): Attr => attr.set('type', value);

/**
 * Values of the `type` attribute.
 */
export type TypeInput =
  | 'button'
  | 'checkbox'
  | 'color'
  | 'date'
  | 'datetime-local'
  | 'email'
  | 'file'
  | 'hidden'
  | 'image'
  | 'month'
  | 'number'
  | 'password'
  | 'radio'
  | 'range'
  | 'reset'
  | 'search'
  | 'submit'
  | 'tel'
  | 'text'
  | 'time'
  | 'url'
  | 'week';

/**
 * Create (or replace) the `type` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/input#type
 */
export const typeInput = (value: TypeInput): Attr => attr.set('type', value);

/**
 * Values of the `type` attribute.
 */
export type TypeOl =
  | 'a'
  | 'A'
  | 'i'
  | 'I'
  | '1';

/**
 * Create (or replace) the `type` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/ol#type
 */
export const typeOl = (value: TypeOl): Attr => attr.set('type', value);

/**
 * Values of the `type` attribute.
 */
export type TypeScript =
  | 'classic'
  | 'importmap'
  | 'module';

const typeScriptValues: Record<TypeScript, string> = {
  classic: '',
  importmap: 'importmap',
  module: 'module',
};

/**
 * Create (or replace) the `type` attribute. `classic` renders as the bare attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/script#type
 */
export const typeScript = (value: TypeScript): Attr => attr.set('type', typeScriptValues[value]);

/**
 * Create (or replace) the `usemap` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/img#usemap
 */
export const usemap = (value: AttrValue): Attr => attr.set('usemap', value);

/**
 * Create (or replace) the `value` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/button#value
 */
export const value = (value: AttrValue): Attr => attr.set('value', value);

/**
 * Create (or replace) the `width` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/canvas#width
 */
export const width = (value: AttrValue): Attr => attr.set('width', value);

/**
 * Values of the `wrap` attribute.
 */
export type Wrap =
  | 'hard'
  | 'soft';

/**
 * Create (or replace) the `wrap` attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/textarea#wrap
 */
export const wrap = (value: Wrap): Attr => attr.set('wrap', value);

/**
 * Values of the `writingsuggestions` attribute.
 */
export type WritingSuggestions =
  | 'true'
  | 'false';

const writingSuggestionsValues: Record<WritingSuggestions, string> = {
  true: '',
  false: 'false',
};

/**
 * Create (or replace) the `writingsuggestions` attribute. `true` renders as the bare attribute.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTML/Global_attributes/writingsuggestions
 */
export const writingSuggestions = (value: WritingSuggestions): Attr => attr.set('writingsuggestions', writingSuggestionsValues[value]);
