import { assert } from 'chai';

import {
  attrs,
  html,
  renderToString,
} from '../src/index.js';

describe('attribute catalog', function () {
  it('replaces values of set attributes', function () {
    assert.strictEqual(
      renderToString(html.a(attrs.href('/old'), attrs.href('/search?q="x"'), 'go')),
      '<a href="/search?q=&quot;x&quot;">go</a>',
    );
  });

  it('joins values of appended attributes with their separator', function () {
    assert.strictEqual(
      renderToString(html.input(attrs.accept('image/png'), attrs.accept('.jpg'))),
      '<input accept="image/png, .jpg">',
    );
    assert.strictEqual(
      renderToString(html.div(attrs.class_('card'), attrs.class_('wide'), attrs.style('color: red'), attrs.style('margin: 0'))),
      '<div class="card wide" style="color: red; margin: 0"></div>',
    );
  });

  it('renders boolean attributes bare', function () {
    assert.strictEqual(
      renderToString(html.input(attrs.disabled(), attrs.checked(), attrs.default_())),
      '<input checked default disabled>',
    );
  });

  it('renders keyword attributes', function () {
    assert.strictEqual(
      renderToString(html.img(attrs.src('cat.png'), attrs.crossorigin('use-credentials'), attrs.decoding('async'))),
      '<img crossorigin="use-credentials" decoding="async" src="cat.png">',
    );
    assert.strictEqual(
      renderToString(html.ol(attrs.typeOl('A'), attrs.start(3))),
      '<ol start="3" type="A"></ol>',
    );
  });

  it('renders the empty keyword as a bare attribute', function () {
    assert.strictEqual(renderToString(html.div(attrs.contenteditable('true'))), '<div contenteditable></div>');
    assert.strictEqual(renderToString(html.div(attrs.contenteditable('plaintext-only'))), '<div contenteditable="plaintext-only"></div>');
    assert.strictEqual(renderToString(html.div(attrs.hidden('until-found'))), '<div hidden="until-found"></div>');
    assert.strictEqual(renderToString(html.script(attrs.typeScript('module'))), '<script type="module"></script>');
  });

  it('accepts known and custom link types', function () {
    assert.strictEqual(
      renderToString(html.link(attrs.rel('preload'), attrs.rel('x-custom'), attrs.as('font'))),
      '<link as="font" rel="preload x-custom">',
    );
  });

  it('renames attributes that are reserved words', function () {
    assert.strictEqual(
      renderToString(html.label(attrs.for_('email'), 'Email')),
      '<label for="email">Email</label>',
    );
  });

  it('re-exports data-* attributes', function () {
    assert.strictEqual(renderToString(html.div(attrs.dataX('row', 7))), '<div data-row="7"></div>');
  });
});
