import type {
  Content,
  Element,
  Renderable,
  RenderSink,
} from './types.js';

import {
  escapeAttributeValue,
  escapeComment,
  escapeText,
} from './html-utils.js';

import {
  isValidAttributeName,
  isValidRawText,
  isValidTagName,
} from './name-check.js';

import {
  RenderError,
} from './render-error.js';

/**
 * The doctype written in front of every document.
 */
export const DOCTYPE = '<!DOCTYPE html>';

/**
 * Sink collecting rendered chunks into a string.
 */
export class StringSink implements RenderSink {
  private readonly chunks: string[] = [];

  write (chunk: string): void {
    this.chunks.push(chunk);
  }

  toString (): string {
    return this.chunks.join('');
  }
}

/**
 * Write to the sink, wrapping sink failures as 'format' errors.
 *
 * @param sink - Target sink.
 * @param chunk - Text to write.
 */
const emit = (sink: RenderSink, chunk: string): void => {
  try {
    sink.write(chunk);
  } catch (err) {
    throw new RenderError({ code: 'format', error: err });
  }
};

/**
 * Error for a child that the parent's kind does not permit.
 */
const invalidChild = (): RenderError => new RenderError({ code: 'invalid-child' });

/**
 * Compare two strings by code point, which is also their UTF-8 byte order.
 * The default sort compares UTF-16 units and puts astral characters before
 * U+E000..U+FFFF.
 *
 * @param a - First string.
 * @param b - Second string.
 * @returns Negative, zero or positive, as for `Array.prototype.sort`.
 */
const compareCodePoints = (a: string, b: string): number => {
  let i = 0;
  while (i < a.length && i < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(i) ?? 0;
    if (ca !== cb) return ca - cb;
    i += ca > 0xffff ? 2 : 1;
  }
  return a.length - b.length;
};

/**
 * Checks whether the node is a sequence of content nodes.
 *
 * @param node - Node(s) to render.
 * @returns True for content sequences.
 */
const isContentList = (node: Renderable): node is readonly Content[] => Array.isArray(node);

/**
 * Render a single content node using the generic rules:
 * raw verbatim, text escaped, comments mangled, elements recursed.
 *
 * @param sink - Target sink.
 * @param content - Content node.
 */
const renderContent = (sink: RenderSink, content: Content): void => {
  switch (content.type) {
    case 'raw':
      emit(sink, content.text);
      return;
    case 'text':
      emit(sink, escapeText(content.text));
      return;
    case 'comment':
      emit(sink, `<!--${escapeComment(content.text)}-->`);
      return;
    case 'element':
      renderElement(sink, content);
      return;
  }
};

/**
 * Render one child of an element according to the parent's kind.
 *
 * @param sink - Target sink.
 * @param parent - Element owning the child.
 * @param child - Child content.
 */
const renderChild = (sink: RenderSink, parent: Element, child: Content): void => {
  switch (parent.kind) {
    case 'void':
      throw invalidChild();

    case 'raw-text':
      if (child.type === 'raw') {
        renderContent(sink, child);
      } else if (child.type === 'text') {
        if (!isValidRawText(parent.name, child.text)) {
          throw new RenderError({ code: 'invalid-raw-text', text: child.text });
        }
        emit(sink, child.text);
      } else {
        throw invalidChild();
      }
      return;

    case 'escapable-raw-text':
      if (child.type === 'raw' || child.type === 'text') {
        renderContent(sink, child);
      } else {
        throw invalidChild();
      }
      return;

    case 'foreign':
    case 'template':
    case 'normal':
      renderContent(sink, child);
      return;

    default: {
      const unknownKind: never = parent.kind;
      throw new TypeError(`Unknown element kind: ${String(unknownKind)}`);
    }
  }
};

/**
 * Render an element, its attributes and its children.
 *
 * @param sink - Target sink.
 * @param element - Element to render.
 */
const renderElement = (sink: RenderSink, element: Element): void => {
  // Checks
  if (!isValidTagName(element.name)) {
    throw new RenderError({ code: 'invalid-tag-name', name: element.name });
  }
  const attrNames = [ ...element.attributes.keys() ].sort(compareCodePoints);
  for (const name of attrNames) {
    if (!isValidAttributeName(name)) {
      throw new RenderError({ code: 'invalid-attr-name', name });
    }
  }

  // Opening tag
  emit(sink, `<${element.name}`);
  for (const name of attrNames) {
    const value = element.attributes.get(name) ?? '';
    emit(sink, value === '' ? ` ${name}` : ` ${name}="${escapeAttributeValue(value)}"`);
  }

  if (element.children.length === 0) {
    // Closing early
    switch (element.kind) {
      case 'void':
        emit(sink, '>');
        break;
      case 'foreign':
        emit(sink, ' />');
        break;
      default:
        emit(sink, `></${element.name}>`);
    }
    return;
  }
  emit(sink, '>');

  // Children
  element.children.forEach((child, i) => {
    try {
      renderChild(sink, element, child);
    } catch (err) {
      throw err instanceof RenderError ? err.at(i, child) : err;
    }
  });

  // Closing tag
  if (element.kind !== 'void') {
    emit(sink, `</${element.name}>`);
  }
};

/**
 * Render a document, a content node or a sequence of content nodes into a sink.
 *
 * Documents are rendered as `<!DOCTYPE html>` followed by the root element.
 * Rendering stops at the first failure; anything written to the sink up to
 * that point is partial output and should be discarded.
 *
 * @param node - Node(s) to render.
 * @param sink - Append-only destination.
 * @throws {RenderError} If the tree is invalid or the sink fails.
 */
export const render = (node: Renderable, sink: RenderSink): void => {
  if (isContentList(node)) {
    for (const content of node) renderContent(sink, content);
    return;
  }
  if (node.type === 'document') {
    emit(sink, DOCTYPE);
    renderElement(sink, node.root);
    return;
  }
  renderContent(sink, node);
};

/**
 * Render to a string.
 *
 * @param node - Node(s) to render.
 * @returns The rendered HTML.
 * @throws {RenderError} If the tree is invalid.
 */
export const renderToString = (node: Renderable): string => {
  const sink = new StringSink();
  render(node, sink);
  return sink.toString();
};
