import { assert } from 'chai';

import {
  attr,
  comment,
  createElement,
  normalElement,
  raw,
  render,
  RenderError,
  renderToString,
  StringSink,
  text,
  toDocument,
} from '../src/index.js';

import {
  body,
  div,
  em,
  h1,
  head,
  html,
  input,
  p,
  script,
  style,
  template,
  textarea,
  title,
} from '../src/html.js';

import * as svg from '../src/svg.js';

/**
 * Run a render that must fail and return the error.
 */
function renderError (fn: () => unknown): RenderError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RenderError) return err;
    throw err;
  }
  assert.fail('expected a RenderError');
}

describe('rendering', function () {
  it('renders a simple website', function () {
    const page = renderToString(toDocument(html(
      head(title('Hello')),
      body(h1('Hello'), p('Hello ', em('world'), '!')),
    )));

    assert.strictEqual(
      page,
      '<!DOCTYPE html><html>' +
      '<head><title>Hello</title></head>' +
      '<body><h1>Hello</h1><p>Hello <em>world</em>!</p></body>' +
      '</html>',
    );
  });

  describe('void elements', function () {
    it('renders without an end tag', function () {
      assert.strictEqual(renderToString(head()), '<head></head>');
      assert.strictEqual(renderToString(input()), '<input>');
    });

    it('rejects any child', function () {
      assert.strictEqual(renderError(() => renderToString(input(p()))).reason.code, 'invalid-child');
      assert.strictEqual(renderError(() => renderToString(input('x'))).reason.code, 'invalid-child');
      assert.strictEqual(renderError(() => renderToString(input(raw('x')))).reason.code, 'invalid-child');
      assert.strictEqual(renderError(() => renderToString(input(comment('x')))).reason.code, 'invalid-child');
    });
  });

  describe('raw text elements', function () {
    it('renders text unescaped', function () {
      assert.strictEqual(
        renderToString(script('foo <script> & </style> bar')),
        '<script>foo <script> & </style> bar</script>',
      );
      assert.strictEqual(renderToString(style('a > b { color: red }')), '<style>a > b { color: red }</style>');
    });

    it('rejects text containing its own end tag', function () {
      const err = renderError(() => renderToString(script('hello </script> world')));
      assert.deepEqual(err.reason, { code: 'invalid-raw-text', text: 'hello </script> world' });
      assert.strictEqual(err.message, 'Render error at /0: Invalid raw text "hello </script> world"');

      assert.throws(() => renderToString(script('hello </ScRiPt ... world')), RenderError);
    });

    it('accepts an unterminated end tag at the end of the text', function () {
      assert.strictEqual(renderToString(script('x </script')), '<script>x </script</script>');
    });

    it('inserts raw children verbatim', function () {
      assert.strictEqual(renderToString(script(raw('</script>'))), '<script></script></script>');
    });

    it('rejects comments and elements', function () {
      assert.strictEqual(renderError(() => renderToString(script(comment('x')))).reason.code, 'invalid-child');
      assert.strictEqual(renderError(() => renderToString(style(p()))).reason.code, 'invalid-child');
    });
  });

  describe('escapable raw text elements', function () {
    it('escapes text', function () {
      assert.strictEqual(
        renderToString(textarea('foo <p> & bar')),
        '<textarea>foo &lt;p&gt; &amp; bar</textarea>',
      );
      assert.strictEqual(
        renderToString(title('</title><script>')),
        '<title>&lt;/title&gt;&lt;script&gt;</title>',
      );
    });

    it('inserts raw children verbatim', function () {
      assert.strictEqual(renderToString(textarea(raw('&copy;'))), '<textarea>&copy;</textarea>');
    });

    it('rejects comments and elements', function () {
      assert.strictEqual(renderError(() => renderToString(textarea(p()))).reason.code, 'invalid-child');
      assert.strictEqual(renderError(() => renderToString(title(comment('x')))).reason.code, 'invalid-child');
    });
  });

  describe('foreign elements', function () {
    it('self-closes when empty', function () {
      assert.strictEqual(renderToString(svg.svg()), '<svg />');
    });

    it('keeps name casing and renders children', function () {
      assert.strictEqual(
        renderToString(svg.svg(attr.set('viewBox', '0 0 10 10'), svg.linearGradient(), svg.text('a < b'))),
        '<svg viewBox="0 0 10 10"><linearGradient /><text>a &lt; b</text></svg>',
      );
    });
  });

  describe('template and normal elements', function () {
    it('render every kind of content', function () {
      assert.strictEqual(
        renderToString(div(raw('<b>x</b>'), 'a & b', comment('note'), p('y'))),
        '<div><b>x</b>a &amp; b<!--note--><p>y</p></div>',
      );
      assert.strictEqual(renderToString(template(p('x'))), '<template><p>x</p></template>');
      assert.strictEqual(renderToString(template()), '<template></template>');
    });
  });

  describe('comments', function () {
    it('mangles sequences that would end the comment', function () {
      assert.strictEqual(renderToString(div(comment('a --> b'))), '<div><!--a ==> b--></div>');
      assert.strictEqual(renderToString(div(comment('->x'))), '<div><!-- ->x--></div>');
      assert.strictEqual(renderToString(div(comment('x<!-'))), '<div><!--x<!- --></div>');
    });
  });

  describe('attributes', function () {
    it('renders attributes sorted by name', function () {
      assert.strictEqual(
        renderToString(input(
          attr.set('name', 'tentacles'),
          attr.set('type', 'number'),
          attr.set('min', 10),
          attr.set('max', 100),
        )),
        '<input max="100" min="10" name="tentacles" type="number">',
      );
    });

    it('renders empty values as the bare name', function () {
      assert.strictEqual(
        renderToString(input(attr.set('name', 'horns'), attr.yes('checked'))),
        '<input checked name="horns">',
      );
    });

    it('escapes only double quotes in values', function () {
      assert.strictEqual(
        renderToString(div(attr.set('title', 'a "quoted" & <b>'))),
        '<div title="a &quot;quoted&quot; & <b>"></div>',
      );
    });

    it('lowercases tag and attribute names of non-foreign elements', function () {
      assert.strictEqual(
        renderToString(normalElement('HTML', attr.set('LANG', 'EN'))),
        '<html lang="EN"></html>',
      );
    });

    it('rejects invalid attribute names, first in sorted order', function () {
      const err = renderError(() => renderToString(div(attr.set('z z', '1'), attr.set('a a', '2'))));
      assert.deepEqual(err.reason, { code: 'invalid-attr-name', name: 'a a' });
      assert.strictEqual(err.message, 'Render error at /: Invalid attribute name "a a"');
    });

    it('orders attribute names by code point', function () {
      // UTF-16 unit order would put the astral character (0xD83D...) first
      const err = renderError(() => renderToString(div(attr.set('\u{1F600}', '1'), attr.set('\uE000', '2'))));
      assert.deepEqual(err.reason, { code: 'invalid-attr-name', name: '\uE000' });
    });
  });

  it('rejects invalid tag names', function () {
    const err = renderError(() => renderToString(createElement('my-tag', 'normal')));
    assert.deepEqual(err.reason, { code: 'invalid-tag-name', name: 'my-tag' });
    assert.strictEqual(err.path, '/');
  });

  it('is deterministic regardless of attribute insertion order', function () {
    const a = div(attr.set('id', 'x'), attr.set('class', 'y'), attr.set('title', 'z'), 'text');
    const b = div(attr.set('title', 'z'), attr.set('id', 'x'), attr.set('class', 'y'), 'text');
    const first = renderToString(a);
    assert.strictEqual(renderToString(a), first);
    assert.strictEqual(renderToString(b), first);
    assert.strictEqual(first, '<div class="y" id="x" title="z">text</div>');
  });

  it('renders content sequences in order', function () {
    assert.strictEqual(renderToString([ text('a<'), raw('<br>'), comment('c') ]), 'a&lt;<br><!--c-->');
    assert.strictEqual(renderToString([]), '');
  });

  describe('sinks', function () {
    it('writes into a custom sink', function () {
      const chunks: string[] = [];
      render(p('x'), { write: (chunk) => { chunks.push(chunk); } });
      assert.strictEqual(chunks.join(''), '<p>x</p>');
    });

    it('collects output in a StringSink', function () {
      const sink = new StringSink();
      render(toDocument(html()), sink);
      assert.strictEqual(sink.toString(), '<!DOCTYPE html><html></html>');
    });

    it('wraps sink failures as format errors', function () {
      const failure = new Error('disk full');
      const err = renderError(() => render(div(p('x')), {
        write: () => { throw failure; },
      }));
      assert.strictEqual(err.reason.code, 'format');
      assert.strictEqual(err.cause, failure);
      assert.strictEqual(err.message, 'Render error at /: disk full');
    });

    it('stops writing at the first error', function () {
      const sink = new StringSink();
      assert.throws(() => render(div('a', input('b'), 'c'), sink), RenderError);
      assert.strictEqual(sink.toString(), '<div>a<input>');
    });
  });
});
