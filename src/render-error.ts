import type {
  Content,
} from './types.js';

/**
 * Reason a tree could not be rendered.
 * - 'format': the sink failed to accept a write
 * - 'invalid-tag-name': an element name failed the tag name check
 * - 'invalid-attr-name': an attribute name failed the attribute name check
 * - 'invalid-child': a child not permitted by the parent's element kind
 * - 'invalid-raw-text': text in a raw text element would close it early
 */
export type RenderErrorReason =
  | { code: 'format'; error: unknown }
  | { code: 'invalid-tag-name'; name: string }
  | { code: 'invalid-attr-name'; name: string }
  | { code: 'invalid-child' }
  | { code: 'invalid-raw-text'; text: string };

/**
 * One step of an error path: the child index and, if that child is an
 * element, its tag name.
 */
export interface RenderErrorPathSegment {
  index: number;
  name?: string;
}

/**
 * Describe a failure reason in a single line.
 *
 * @param reason - Failure reason.
 * @returns Human-readable description.
 */
const describeReason = (reason: RenderErrorReason): string => {
  switch (reason.code) {
    case 'format':
      return reason.error instanceof Error ? reason.error.message : String(reason.error);
    case 'invalid-tag-name':
      return `Invalid tag name ${JSON.stringify(reason.name)}`;
    case 'invalid-attr-name':
      return `Invalid attribute name ${JSON.stringify(reason.name)}`;
    case 'invalid-child':
      return 'Invalid child';
    case 'invalid-raw-text':
      return `Invalid raw text ${JSON.stringify(reason.text)}`;
  }
};

/**
 * Error thrown when a tree cannot be rendered.
 *
 * The error is raised at the offending node. Each enclosing element adds a
 * path segment while the error propagates, so the segments are collected
 * innermost first and reversed for display.
 *
 * @example
 * ```ts
 * try {
 *   renderToString(form('greeting: ', input(p())));
 * } catch (err) {
 *   if (isRenderError(err)) console.log(err.path); // '/1(input)/0'
 * }
 * ```
 */
export class RenderError extends Error {
  readonly reason: RenderErrorReason;
  private readonly reversePath: RenderErrorPathSegment[] = [];

  constructor (reason: RenderErrorReason) {
    super('', reason.code === 'format' ? { cause: reason.error } : undefined);
    this.name = 'RenderError';
    this.reason = reason;
    this.message = this.describe();
  }

  /**
   * Record that the error happened while processing a child.
   *
   * @param index - Zero-based index of the child within its parent.
   * @param child - The child being processed.
   * @returns This error, for rethrowing.
   */
  at (index: number, child: Content): this {
    this.reversePath.push(child.type === 'element' ? { index, name: child.name } : { index });
    this.message = this.describe();
    return this;
  }

  /**
   * Path segments from the topmost element down to the failing node.
   */
  get segments (): RenderErrorPathSegment[] {
    return this.reversePath.slice().reverse();
  }

  /**
   * Path from the topmost element to the failing node, made of `/index(tagname)`
   * or `/index` segments, e.g. `/1(input)/0`. The root itself is `/`.
   */
  get path (): string {
    if (this.reversePath.length === 0) return '/';
    return this.segments
      .map((seg) => (seg.name === undefined ? `/${seg.index}` : `/${seg.index}(${seg.name})`))
      .join('');
  }

  private describe (): string {
    return `Render error at ${this.path}: ${describeReason(this.reason)}`;
  }
}

/**
 * Type guard for {@link RenderError}.
 *
 * @param value - Value to test.
 * @returns True if the value is a RenderError.
 */
export const isRenderError = (value: unknown): value is RenderError => value instanceof RenderError;
