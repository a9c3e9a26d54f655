import * as assert from 'assert';
import * as _ from 'lodash';

import {
  closureSymbols,
  generateClosure,
  kleeneClosure,
  positiveClosure,
  projectedSize,
} from '../src/closure';
import { ResourceLimitError, ValidationError } from '../src/AutomatonError';
import { setConfig } from '../src/config';
import { quietLogs } from './helpers';

describe('Closure', function() {
  quietLogs();

  describe('generateClosure', function() {
    it('Kleene closure of ab up to length 2', function () {
      assert.deepStrictEqual(generateClosure('ab', 2, true),
        ['', 'a', 'b', 'aa', 'ab', 'ba', 'bb']);
    });

    it('positive closure drops the empty string', function () {
      assert.deepStrictEqual(generateClosure('ab', 2, false),
        ['a', 'b', 'aa', 'ab', 'ba', 'bb']);
    });

    it('repeated symbols collapse', function () {
      assert.deepStrictEqual(generateClosure('abba', 2, true), generateClosure('ab', 2, true));
    });

    it('keeps the order symbols are first given in', function () {
      assert.deepStrictEqual(generateClosure('ba', 2, false),
        ['b', 'a', 'bb', 'ba', 'ab', 'aa']);
    });

    it('ignores whitespace', function () {
      assert.deepStrictEqual(generateClosure(' 0 1 ', 1, false), ['0', '1']);
    });

    it('length 0', function () {
      assert.deepStrictEqual(generateClosure('ab', 0, true), ['']);
      assert.deepStrictEqual(generateClosure('ab', 0, false), []);
    });

    it('no symbols', function () {
      assert.deepStrictEqual(generateClosure('', 3, true), ['']);
      assert.deepStrictEqual(generateClosure('', 3, false), []);
    });

    it('no duplicates, shortest first', function () {
      let strings = generateClosure('abc', 3, true);
      assert.strictEqual(strings.length, 1 + 3 + 9 + 27);
      assert.strictEqual(_.uniq(strings).length, strings.length);
      assert.deepStrictEqual(strings.map((s) => s.length), _.sortBy(strings.map((s) => s.length)));
    });

    it('negative length', function () {
      assert.throws(() => generateClosure('ab', -1, true), ValidationError);
    });

    it('fractional length', function () {
      assert.throws(() => generateClosure('ab', 1.5, true), ValidationError);
    });

    it('refuses runs beyond the limit', function () {
      assert.throws(() => generateClosure('ab', 3, true, { limit: 14 }), _.conforms({
        name: _.partial(_.isEqual, 'ResourceLimitError'),
        limit: _.partial(_.isEqual, 14),
        projected: _.partial(_.isEqual, 15),
      }));
      assert.strictEqual(generateClosure('ab', 3, true, { limit: 15 }).length, 15);
    });

    it('uses the configured limit by default', function () {
      assert.throws(() => generateClosure('abcdefghij', 6, true), ResourceLimitError);
    });

    it('large runs under a raised limit', function () {
      this.timeout(20000);
      setConfig({ closureLimit: 2000000 });

      let words = generateClosure('ab', 19, true);
      assert.strictEqual(words.length, 1048575);
      assert.strictEqual(words[1], 'a');
      assert.strictEqual(words[words.length - 1], _.repeat('b', 19));
    });
  });

  it('kleeneClosure / positiveClosure', function () {
    assert.deepStrictEqual(kleeneClosure('a', 3), ['', 'a', 'aa', 'aaa']);
    assert.deepStrictEqual(positiveClosure('a', 3), ['a', 'aa', 'aaa']);
  });

  it('closureSymbols', function () {
    assert.deepStrictEqual(closureSymbols('a b\tab c'), ['a', 'b', 'c']);
  });

  describe('projectedSize', function() {
    it('sums the layers', function () {
      assert.strictEqual(projectedSize(2, 2, true), 7);
      assert.strictEqual(projectedSize(2, 2, false), 6);
      assert.strictEqual(projectedSize(0, 5, true), 1);
    });

    it('stops counting past the ceiling', function () {
      assert.strictEqual(projectedSize(10, 100, true, 50), 111);
    });
  });
});
