'use strict';

import { toSymbols } from './parser-utils';

/**
 * Render symbols with the one at `position` in brackets, e.g. `b[a]b`.
 * Nothing is bracketed once the whole input is consumed.
 */
export function formatTape(symbols: string[], position: number): string {
  return symbols
    .map((symbol, i) => i === position ? '[' + symbol + ']' : symbol)
    .join('');
}

/** Read-only input tape with a head that only moves right. */
export default class InputTape {
  private readonly symbols: string[];
  private position = 0;

  constructor (input: string) {
    this.symbols = toSymbols(input);
  }

  public get head(): number {
    return this.position;
  }

  public get length(): number {
    return this.symbols.length;
  }

  public get atEnd(): boolean {
    return this.position >= this.symbols.length;
  }

  /** The symbol under the head, or undefined past the end. */
  public read(): string | undefined {
    return this.symbols[this.position];
  }

  public headRight(): void {
    if (this.atEnd)
      throw new RangeError('cannot move past the end of the input');
    this.position++;
  }

  public get remaining(): string {
    return this.symbols.slice(this.position).join('');
  }

  public toString(): string {
    return formatTape(this.symbols, this.position);
  }
}
