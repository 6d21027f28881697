/*!
 * elhtml
 *
 * Build HTML as plain data and render it to injection-safe HTML5 text.
 *
 * Element kinds enforce the HTML content model: void elements have no
 * children, raw text elements cannot be closed early by their own text, and
 * text, comments and attribute values are escaped for their context.
 * Invalid trees are rejected with the path to the offending node.
 */

export type {
  Attr,
  CommentContent,
  Content,
  Document,
  Element,
  ElementComponent,
  ElementKind,
  RawContent,
  Renderable,
  RenderSink,
  TextContent,
} from './types.js';

export {
  DOCTYPE,
  render,
  renderToString,
  StringSink,
} from './render.js';

export {
  isRenderError,
  RenderError,
} from './render-error.js';

export type {
  RenderErrorPathSegment,
  RenderErrorReason,
} from './render-error.js';

export {
  escapeAttributeValue,
  escapeComment,
  escapeText,
} from './html-utils.js';

export {
  asciiLower,
  isValidAttributeName,
  isValidRawText,
  isValidTagName,
} from './name-check.js';

export {
  attr,
  classes,
  comment,
  createElement,
  dataX,
  doctype,
  elementFactory,
  id,
  isDocument,
  isElement,
  normalElement,
  raw,
  text,
  toDocument,
  withComponents,
} from './element.js';

export type {
  ElementFactory,
} from './element.js';

export * as html from './html.js';
export * as svg from './svg.js';
export * as mathml from './mathml.js';
export * as attrs from './attr.js';
