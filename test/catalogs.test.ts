import { assert } from 'chai';

import {
  html,
  mathml,
  renderToString,
  svg,
} from '../src/index.js';

describe('tag catalogs', function () {
  it('assigns element kinds to html tags', function () {
    const voids = [ html.base, html.link, html.meta, html.hr, html.br, html.wbr, html.area, html.img, html.track, html.embed, html.source, html.col, html.input ];
    for (const make of voids) {
      assert.strictEqual(make().kind, 'void', make().name);
    }

    assert.strictEqual(html.script().kind, 'raw-text');
    assert.strictEqual(html.style().kind, 'raw-text');
    assert.strictEqual(html.title().kind, 'escapable-raw-text');
    assert.strictEqual(html.textarea().kind, 'escapable-raw-text');
    assert.strictEqual(html.template().kind, 'template');
    assert.strictEqual(html.svg().kind, 'foreign');
    assert.strictEqual(html.math().kind, 'foreign');
    assert.strictEqual(html.div().kind, 'normal');
  });

  it('renames tags that are reserved words', function () {
    assert.strictEqual(html.var_().name, 'var');
    assert.strictEqual(svg.switch_().name, 'switch');
  });

  it('creates a new element on every call', function () {
    const a = html.div('a');
    const b = html.div();
    assert.notStrictEqual(a, b);
    assert.strictEqual(b.children.length, 0);
  });

  it('keeps svg names camel-cased', function () {
    assert.strictEqual(svg.feGaussianBlur().name, 'feGaussianBlur');
    assert.strictEqual(svg.foreignObject().kind, 'foreign');
  });

  it('renders mathml as foreign content', function () {
    assert.strictEqual(
      renderToString(mathml.math(mathml.mfrac(mathml.mn('1'), mathml.mn('2')), mathml.mspace())),
      '<math><mfrac><mn>1</mn><mn>2</mn></mfrac><mspace /></math>',
    );
  });
});
