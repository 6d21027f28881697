/**
 * Element kinds as defined by the HTML syntax rules.
 * - 'void': no children, no end tag (e.g. `<input>`)
 * - 'raw-text': text is not parsed for markup (`<script>`, `<style>`)
 * - 'escapable-raw-text': like raw text, but character references are
 *   recognized (`<title>`, `<textarea>`)
 * - 'foreign': SVG/MathML elements; names keep their casing and empty
 *   elements self-close
 * - 'template': the `<template>` element
 * - 'normal': everything else
 *
 * @see https://html.spec.whatwg.org/multipage/syntax.html#elements-2
 */
export type ElementKind =
  | 'void'
  | 'raw-text'
  | 'escapable-raw-text'
  | 'foreign'
  | 'template'
  | 'normal';

/**
 * Raw content node: inserted into the output verbatim (use with caution).
 */
export interface RawContent {
  type: 'raw';
  text: string;
}

/**
 * Text content node: escaped according to the containing element kind.
 */
export interface TextContent {
  type: 'text';
  text: string;
}

/**
 * Comment content node. Sequences that would end the comment early are mangled.
 */
export interface CommentContent {
  type: 'comment';
  text: string;
}

/**
 * An element with its attributes and children.
 * - name: Tag name. Lowercased on construction unless `kind` is 'foreign'.
 * - attributes: Rendered sorted by name, so insertion order does not matter.
 * - children: Rendered in order.
 */
export interface Element {
  type: 'element';
  name: string;
  kind: ElementKind;
  attributes: Map<string, string>;
  children: Content[];
}

/** Union of all content node types. */
export type Content = RawContent | TextContent | CommentContent | Element;

/**
 * A complete HTML document. Renders as `<!DOCTYPE html>` followed by the root element.
 */
export interface Document {
  type: 'document';
  root: Element;
}

/** Anything the renderer accepts. */
export type Renderable = Document | Content | readonly Content[];

/**
 * Attribute component used while building elements.
 * - mode 'set': replace any existing value
 * - mode 'append': join with `separator` if a value exists, otherwise set
 */
export interface Attr {
  type: 'attr';
  name: string;
  value: string;
  mode: 'set' | 'append';
  separator: string;
}

/**
 * Anything that can be added to an element while building it.
 * - strings and numbers become text children
 * - content nodes are appended as children
 * - attributes are applied to the element
 * - arrays are flattened in order
 * - `null`, `undefined` and `false` add nothing
 */
export type ElementComponent =
  | string
  | number
  | Content
  | Attr
  | null
  | undefined
  | false
  | readonly ElementComponent[];

/**
 * Append-only destination for rendered text. Signals failure by throwing.
 */
export interface RenderSink {
  write (chunk: string): void;
}
