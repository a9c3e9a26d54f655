'use strict';

import * as _ from 'lodash';
import { ResourceLimitError, ValidationError } from './AutomatonError';
import { getConfig } from './config';
import { createLogger } from './logger';
import { toSymbols } from './parser-utils';

const log = createLogger('closure');

export interface ClosureOptions {
  /** Refuse runs that would produce more strings than this. */
  limit?: number;
}

/** Deduplicated symbols in first-seen order; whitespace is ignored. */
export function closureSymbols(symbols: string): string[] {
  return _.uniq(toSymbols(symbols).filter((c) => c.trim() !== ''));
}

/**
 * How many strings `generateClosure` would produce: the sum of
 * `k^L` over the lengths it covers. Stops counting once past `ceiling`.
 */
export function projectedSize(k: number, maxLength: number, includeEmpty: boolean, ceiling = Infinity): number {
  let total = includeEmpty ? 1 : 0;
  let layer = 1;
  for (let length = 1; length <= maxLength; length++) {
    layer *= k;
    total += layer;
    if (total > ceiling || layer === 0) break;
  }
  return total;
}

/**
 * Enumerate every string over `symbols` up to `maxLength`, shortest first,
 * and within one length in symbol order (`a, b, aa, ab, ba, bb`).
 *
 * `includeEmpty` selects the Kleene closure (with `""`) over the positive
 * closure. Throws `ResourceLimitError` before generating anything when the
 * output would exceed the configured limit.
 */
export function generateClosure(
  symbols: string,
  maxLength: number,
  includeEmpty: boolean,
  options: ClosureOptions = {}): string[]
{
  if (!_.isSafeInteger(maxLength) || maxLength < 0)
    throw new ValidationError('Maximum length must be a non-negative integer', {
      problemValue: maxLength,
    });

  let alphabet = closureSymbols(symbols);
  let limit = options.limit ?? getConfig().closureLimit;

  let projected = projectedSize(alphabet.length, maxLength, includeEmpty, limit);
  if (projected > limit) {
    log.warn('closure refused', { symbols: alphabet, maxLength, limit });
    throw new ResourceLimitError(projected, limit);
  }

  let result: string[] = includeEmpty ? [''] : [];
  let layer = [''];
  for (let length = 1; length <= maxLength && alphabet.length > 0; length++) {
    layer = _.flatMap(layer, (prefix) => alphabet.map((symbol) => prefix + symbol));
    for (let word of layer) result.push(word);
  }

  return result;
}

export function kleeneClosure(symbols: string, maxLength: number, options?: ClosureOptions): string[] {
  return generateClosure(symbols, maxLength, true, options);
}

export function positiveClosure(symbols: string, maxLength: number, options?: ClosureOptions): string[] {
  return generateClosure(symbols, maxLength, false, options);
}
