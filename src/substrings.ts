import * as _ from 'lodash';
import { toSymbols } from './parser-utils';

export interface Decomposition {
  /** distinct non-empty spans, ordered by start then length */
  substrings: string[];
  /** shortest first, the whole input last */
  prefixes: string[];
  /** the whole input first, shortest last */
  suffixes: string[];
}

export function compute(input: string): Decomposition {
  let symbols = toSymbols(input);
  let n = symbols.length;
  let span = (from: number, to: number) => symbols.slice(from, to).join('');

  let substrings = _.uniq(
    _.flatMap(_.range(n), (i) =>
      _.range(i + 1, n + 1).map((j) => span(i, j))));

  return {
    substrings,
    prefixes: _.range(1, n + 1).map((k) => span(0, k)),
    suffixes: _.range(0, n).map((k) => span(k, n)),
  };
}
