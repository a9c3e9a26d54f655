import * as assert from 'assert';
import * as _ from 'lodash';

import { compute } from '../src/substrings';

describe('Substrings', function() {
  it('abc', function () {
    let result = compute('abc');

    assert.deepStrictEqual(_.sortBy(result.substrings), ['a', 'ab', 'abc', 'b', 'bc', 'c']);
    assert.deepStrictEqual(result.prefixes, ['a', 'ab', 'abc']);
    assert.deepStrictEqual(result.suffixes, ['abc', 'bc', 'c']);
  });

  it('substrings are ordered by start, then length', function () {
    assert.deepStrictEqual(compute('abc').substrings, ['a', 'ab', 'abc', 'b', 'bc', 'c']);
  });

  it('repeated spans count once', function () {
    let result = compute('aaa');

    assert.deepStrictEqual(result.substrings, ['a', 'aa', 'aaa']);
    assert.deepStrictEqual(result.prefixes, ['a', 'aa', 'aaa']);
    assert.deepStrictEqual(result.suffixes, ['aaa', 'aa', 'a']);
  });

  it('abab', function () {
    assert.deepStrictEqual(compute('abab').substrings, ['a', 'ab', 'aba', 'abab', 'b', 'ba', 'bab']);
  });

  it('empty input', function () {
    assert.deepStrictEqual(compute(''), { substrings: [], prefixes: [], suffixes: [] });
  });

  it('at most n(n+1)/2 substrings', function () {
    let input = 'abcdefg';
    let n = input.length;
    assert.strictEqual(compute(input).substrings.length, n * (n + 1) / 2);
  });
});
