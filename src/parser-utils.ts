import * as _ from 'lodash';

export type PlainObject = Record<string, unknown>;

export function isRecord(val: unknown): val is PlainObject {
  return _.isPlainObject(val);
}

/** A symbol is exactly one character (one code point). */
export function isSymbol(val: unknown): val is string {
  return _.isString(val) && Array.from(val).length === 1;
}

export function toSymbols(input: string): string[] {
  return Array.from(input);
}

/** Accepts text or raw file bytes; bytes are decoded as UTF-8. */
export function decodeText(bytes: string | Uint8Array): string {
  if (_.isString(bytes)) return bytes;
  return new TextDecoder('utf-8').decode(bytes);
}

export function transitionKey(from: string, symbol: string): string {
  return from + ',' + symbol;
}

/**
 * Split a native transition key `"state,symbol"`.
 * State ids never contain a comma, so the first comma separates; the symbol
 * part may itself be `,` (key `"q0,,"`) or empty for epsilon (key `"q0,"`).
 * Returns undefined when the key has no separator.
 */
export function splitTransitionKey(key: string): [string, string] | undefined {
  let at = key.indexOf(',');
  if (at < 0) return undefined;
  return [key.slice(0, at), key.slice(at + 1)];
}

/**
 * Collect every element named `tag` below `node`, at any depth, in document
 * order. Elements are not searched inside a collected element.
 */
export function collectElements(node: unknown, tag: string): PlainObject[] {
  if (_.isArray(node))
    return _.flatMap(node, (item) => collectElements(item, tag));
  if (!isRecord(node))
    return [];

  return _.flatMap(_.toPairs(node), ([key, value]) => {
    if (key !== tag) return collectElements(value, tag);
    return _.castArray(value).map((item): PlainObject => isRecord(item) ? item : {});
  });
}
