import { assert } from 'chai';

import {
  asciiLower,
  isValidAttributeName,
  isValidRawText,
  isValidTagName,
} from '../src/name-check.js';

describe('name checks', function () {
  describe('asciiLower', function () {
    it('maps A-Z and leaves other characters alone', function () {
      assert.strictEqual(asciiLower('DataX-1_Z'), 'datax-1_z');
      assert.strictEqual(asciiLower('\u212A\u00C9I'), '\u212A\u00C9i');
    });
  });

  describe('isValidTagName', function () {
    it('accepts ASCII letters followed by letters and digits', function () {
      assert.isTrue(isValidTagName('p'));
      assert.isTrue(isValidTagName('h1'));
      assert.isTrue(isValidTagName('linearGradient'));
    });

    it('rejects empty names, leading digits and other characters', function () {
      assert.isFalse(isValidTagName(''));
      assert.isFalse(isValidTagName('1h'));
      assert.isFalse(isValidTagName('my-tag'));
      assert.isFalse(isValidTagName('a b'));
      assert.isFalse(isValidTagName('div>'));
      assert.isFalse(isValidTagName('ä'));
    });
  });

  describe('isValidAttributeName', function () {
    it('accepts letters, digits, dashes and underscores after a letter', function () {
      assert.isTrue(isValidAttributeName('href'));
      assert.isTrue(isValidAttributeName('data-user_id'));
      assert.isTrue(isValidAttributeName('viewBox'));
      assert.isTrue(isValidAttributeName('aria-label2'));
    });

    it('rejects names that could break the tag', function () {
      assert.isFalse(isValidAttributeName(''));
      assert.isFalse(isValidAttributeName('-x'));
      assert.isFalse(isValidAttributeName('_x'));
      assert.isFalse(isValidAttributeName('on click'));
      assert.isFalse(isValidAttributeName('a="b"'));
      assert.isFalse(isValidAttributeName('x/'));
      assert.isFalse(isValidAttributeName('xlink:href'));
    });
  });

  describe('isValidRawText', function () {
    it('accepts text without a matching end tag', function () {
      assert.isTrue(isValidRawText('script', 'foo <script> & </style> bar'));
      assert.isTrue(isValidRawText('script', 'a < b && c > d'));
      assert.isTrue(isValidRawText('script', '</scripts>'));
      assert.isTrue(isValidRawText('script', '</scrip>'));
      assert.isTrue(isValidRawText('script', ''));
    });

    it('rejects the end tag followed by any delimiter', function () {
      for (const delim of [ '\t', '\n', '\f', '\r', ' ', '>', '/' ]) {
        assert.isFalse(isValidRawText('script', `x </script${delim} y`), JSON.stringify(delim));
      }
    });

    it('compares the tag name ASCII case-insensitively', function () {
      assert.isFalse(isValidRawText('script', 'hello </ScRiPt ... world'));
      assert.isFalse(isValidRawText('STYLE', '</style>'));
    });

    it('accepts an unterminated end tag at the very end of the text', function () {
      assert.isTrue(isValidRawText('script', 'hello </script'));
      assert.isTrue(isValidRawText('script', '</SCRIPT'));
    });

    it('keeps scanning after a non-matching occurrence', function () {
      assert.isFalse(isValidRawText('style', '</a> </stylex </style>'));
      assert.isTrue(isValidRawText('style', '</style</style'));
    });

    it('rejects non-ASCII tag names', function () {
      assert.throws(() => isValidRawText('scäipt', 'x'), TypeError);
    });
  });
});
