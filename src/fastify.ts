import type { FastifyReply } from 'fastify';

import type {
  Document,
} from './types.js';

import {
  renderToString,
} from './render.js';

import {
  isRenderError,
} from './render-error.js';

/**
 * Render a document and send it as the reply.
 *
 * On success the reply is `200` with `text/html; charset=utf-8`. If the tree
 * cannot be rendered, the error is logged with the request logger and the
 * reply is `500` with the error message as plain text.
 *
 * Only whole documents are accepted, so a handler cannot send an element
 * fragment without its doctype by accident.
 *
 * @param reply - Fastify reply.
 * @param document - Document to render.
 * @returns The reply, so handlers can `return sendDocument(reply, doc)`.
 *
 * @example
 * ```ts
 * app.get('/', async (_request, reply) => {
 *   return sendDocument(reply, toDocument(html.html(html.body(html.h1('Hello')))));
 * });
 * ```
 */
export const sendDocument = (reply: FastifyReply, document: Document): FastifyReply => {
  let body: string;
  try {
    body = renderToString(document);
  } catch (err) {
    if (!isRenderError(err)) throw err;
    reply.log.error({ err, path: err.path }, 'failed to render HTML document');
    return reply.code(500).type('text/plain; charset=utf-8').send(err.message);
  }
  return reply.code(200).type('text/html; charset=utf-8').send(body);
};
