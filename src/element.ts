import type {
  Attr,
  CommentContent,
  Content,
  Document,
  Element,
  ElementComponent,
  ElementKind,
  RawContent,
  TextContent,
} from './types.js';

import {
  DOCTYPE,
} from './render.js';

import {
  asciiLower,
} from './name-check.js';

/**
 * Raw content, inserted verbatim. Nothing is escaped or checked.
 *
 * @param text - HTML to insert.
 * @returns Raw content node.
 */
export const raw = (text: string): RawContent => ({ type: 'raw', text });

/**
 * Text content, escaped when rendered.
 *
 * @param text - Plain text.
 * @returns Text content node.
 */
export const text = (text: string): TextContent => ({ type: 'text', text });

/**
 * Comment content.
 *
 * @param text - Comment text.
 * @returns Comment content node.
 */
export const comment = (text: string): CommentContent => ({ type: 'comment', text });

/** The `<!DOCTYPE html>` marker as raw content. */
export const doctype = (): RawContent => raw(DOCTYPE);

/**
 * Attribute constructors.
 *
 * Values are stringified; `true`/`false` become `"true"`/`"false"`. Use
 * {@link attr.yes} for boolean attributes.
 */
export const attr = {
  /**
   * Create (or replace) an attribute.
   *
   * @param name - Attribute name.
   * @param value - Attribute value.
   */
  set (name: string, value: string | number | boolean): Attr {
    return { type: 'attr', name, value: String(value), mode: 'set', separator: '' };
  },

  /**
   * Create (or append to) an attribute. An existing value is joined with the
   * new one using `separator`.
   *
   * @param name - Attribute name.
   * @param value - Value to append.
   * @param separator - Separator placed between the old and the new value.
   */
  append (name: string, value: string | number | boolean, separator: string): Attr {
    return { type: 'attr', name, value: String(value), mode: 'append', separator };
  },

  /**
   * Create (or replace) a boolean attribute. Rendered as the bare name.
   *
   * @param name - Attribute name.
   */
  yes (name: string): Attr {
    return { type: 'attr', name, value: '', mode: 'set', separator: '' };
  },
};

/** Create (or replace) the `id` attribute. */
export const id = (value: string): Attr => attr.set('id', value);

/** Create (or append to) the `class` attribute. */
export const classes = (value: string): Attr => attr.append('class', value, ' ');

/**
 * Create (or replace) a `data-*` attribute.
 *
 * @param name - Name without the `data-` prefix.
 * @param value - Attribute value.
 */
export const dataX = (name: string, value: string | number | boolean): Attr => attr.set(`data-${name}`, value);

/**
 * Checks whether a component is an attribute.
 *
 * @param c - Content or attribute.
 * @returns True for attributes.
 */
const isAttr = (c: Content | Attr): c is Attr => c.type === 'attr';

/**
 * Checks whether a component is a list of components.
 *
 * @param c - Component.
 * @returns True for component lists.
 */
const isComponentList = (c: ElementComponent): c is readonly ElementComponent[] => Array.isArray(c);

/**
 * Apply an attribute to an element. Names are ASCII-lowercased unless the element is foreign.
 *
 * @param element - Target element.
 * @param a - Attribute to apply.
 */
const applyAttr = (element: Element, a: Attr): void => {
  const name = element.kind === 'foreign' ? a.name : asciiLower(a.name);
  const prev = element.attributes.get(name);
  if (a.mode === 'append' && prev !== undefined) {
    element.attributes.set(name, prev + a.separator + a.value);
  } else {
    element.attributes.set(name, a.value);
  }
};

/**
 * Add components to an existing element.
 *
 * @param element - Element to extend.
 * @param components - Children, attributes or lists of both.
 * @returns The same element.
 */
export const withComponents = (element: Element, ...components: ElementComponent[]): Element => {
  for (const c of components) {
    if (c === null || c === undefined || c === false) continue;
    if (typeof c === 'string' || typeof c === 'number') {
      element.children.push(text(String(c)));
    } else if (isComponentList(c)) {
      withComponents(element, ...c);
    } else if (isAttr(c)) {
      applyAttr(element, c);
    } else {
      element.children.push(c);
    }
  }
  return element;
};

/**
 * Create an element. The tag name is ASCII-lowercased unless `kind` is 'foreign';
 * other characters are kept, so a non-ASCII name still fails validation at render time.
 *
 * @param name - Tag name.
 * @param kind - Element kind.
 * @param components - Children and attributes.
 * @returns The new element.
 */
export const createElement = (name: string, kind: ElementKind, ...components: ElementComponent[]): Element => {
  const element: Element = {
    type: 'element',
    name: kind === 'foreign' ? name : asciiLower(name),
    kind,
    attributes: new Map(),
    children: [],
  };
  return withComponents(element, ...components);
};

/**
 * Create a normal element.
 *
 * @param name - Tag name.
 * @param components - Children and attributes.
 * @returns The new element.
 */
export const normalElement = (name: string, ...components: ElementComponent[]): Element => createElement(name, 'normal', ...components);

/**
 * Wrap an element in a document, adding `<!DOCTYPE html>` when rendered.
 *
 * @param root - Root element, usually `<html>`.
 * @returns The document.
 */
export const toDocument = (root: Element): Document => ({ type: 'document', root });

/**
 * Type guard for elements.
 *
 * @param value - Value to test.
 * @returns True if the value is an element node.
 */
export const isElement = (value: Content | Document): value is Element => value.type === 'element';

/**
 * Type guard for documents.
 *
 * @param value - Value to test.
 * @returns True if the value is a document.
 */
export const isDocument = (value: Content | Document): value is Document => value.type === 'document';

/**
 * Constructor function for a single tag, as found in the tag catalogs.
 */
export type ElementFactory = (...components: ElementComponent[]) => Element;

/**
 * Make a constructor function for a tag.
 *
 * @param name - Tag name.
 * @param kind - Element kind. Defaults to 'normal'.
 * @returns Function creating a new element on each call.
 */
export const elementFactory = (name: string, kind: ElementKind = 'normal'): ElementFactory => {
  return (...components) => createElement(name, kind, ...components);
};
