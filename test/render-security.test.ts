import { assert } from 'chai';

import {
  attr,
  comment,
  renderToString,
  toDocument,
} from '../src/index.js';

import {
  body,
  div,
  head,
  html,
  p,
  script,
  textarea,
  title,
} from '../src/html.js';

import { parseHtml, randStr } from './test-utils/dom.js';

describe('rendering / security', function () {
  describe('round trip through an HTML parser', function () {
    it('text content parses back to the original text', function () {
      for (let i = 0; i < 50; i++) {
        const val = randStr(30);
        const doc = parseHtml(renderToString(toDocument(html(head(title(val)), body(p(val))))));

        assert.strictEqual(doc.querySelector('p')?.textContent, val);
        assert.strictEqual(doc.querySelector('title')?.textContent, val);
        assert.strictEqual(doc.body.children.length, 1);
      }
    });

    it('textarea content parses back to the original value', function () {
      for (let i = 0; i < 50; i++) {
        // a leading newline is dropped by the parser, so start with a letter
        const val = 'x' + randStr(30);
        const doc = parseHtml(renderToString(toDocument(html(body(textarea(val))))));
        assert.strictEqual(doc.querySelector('textarea')?.value, val);
      }
    });

    it('attribute values parse back to the original value', function () {
      for (let i = 0; i < 50; i++) {
        // `&` is left out: character references are not escaped in attribute values
        const val = randStr(30, 'abcXYZ019<>"\'/=- \täöü€');
        const doc = parseHtml(renderToString(toDocument(html(body(div(attr.set('title', val)))))));
        const el = doc.querySelector('div');
        assert.strictEqual(el?.getAttribute('title'), val);
        assert.strictEqual(el?.attributes.length, 1);
      }
    });

    it('raw text parses back unchanged', function () {
      const code = 'if (a < b && c > "</scrip") { x = \'</style>\'; }';
      const doc = parseHtml(renderToString(toDocument(html(head(script(code))))));
      assert.strictEqual(doc.querySelector('script')?.textContent, code);
    });
  });

  describe('no breaking out of context', function () {
    it('quotes in attribute values cannot add attributes', function () {
      const doc = parseHtml(renderToString(toDocument(html(body(div(attr.set('title', 'x" onclick="alert(1)')))))));
      const el = doc.querySelector('div');
      assert.strictEqual(el?.getAttribute('title'), 'x" onclick="alert(1)');
      assert.isFalse(el?.hasAttribute('onclick'));
    });

    it('comments cannot be closed early', function () {
      const out = renderToString(toDocument(html(body(comment('--><script>alert(1)</script>')))));
      assert.strictEqual(out, '<!DOCTYPE html><html><body><!--==><script>alert(1)</script>--></body></html>');

      const doc = parseHtml(out);
      assert.isNull(doc.querySelector('script'));
      assert.strictEqual(doc.body.childNodes.length, 1);
      assert.strictEqual(doc.body.firstChild?.nodeType, 8);
      assert.strictEqual(doc.body.firstChild?.textContent, '==><script>alert(1)</script>');
    });

    it('text cannot open elements', function () {
      const doc = parseHtml(renderToString(toDocument(html(body(p('<img src=x onerror=alert(1)>'))))));
      assert.isNull(doc.querySelector('img'));
    });
  });
});
