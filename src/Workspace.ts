'use strict';

import Automaton from './Automaton';
import type { TransitionTableView } from './Automaton';
import { isAutomatonError, ValidationError } from './AutomatonError';
import type { AutomatonError } from './AutomatonError';
import { generateClosure } from './closure';
import type { ClosureOptions } from './closure';
import { loadJflap } from './jflap-format';
import { loadNative, saveNative } from './native-format';
import * as simulator from './simulator';
import type { Configuration, SimulationTrace } from './simulator';
import { compute } from './substrings';
import type { Decomposition } from './substrings';
import type { DFATransition, State } from './TransitionSpec';

export type Result<T> =
  | { ok: true, value: T }
  | { ok: false, error: AutomatonError };

/**
 * Run `fn`, turning a thrown `AutomatonError` into a failed result.
 * Anything else is a bug and propagates.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (isAutomatonError(e)) return { ok: false, error: e };
    throw e;
  }
}

export interface TracePosition {
  trace: SimulationTrace;
  index: number;
  config: Configuration;
}

/**
 * The engine as seen by an editor: one current automaton, the trace of the
 * last validated string and the step the user is looking at.
 *
 * Any edit discards the trace. Loading replaces the automaton only when
 * the file is accepted; a rejected file leaves everything as it was.
 */
export default class Workspace {
  private model = new Automaton();
  private trace: SimulationTrace | undefined;
  private index = 0;

  public get automaton(): Automaton {
    return this.model;
  }

  public get currentTrace(): SimulationTrace | undefined {
    return this.trace;
  }

  public get currentIndex(): number {
    return this.index;
  }

  private edit<T>(fn: (model: Automaton) => T): Result<T> {
    let result = attempt(() => fn(this.model));
    if (result.ok) this.discardTrace();
    return result;
  }

  private replace(fn: () => Automaton): Result<Automaton> {
    let result = attempt(fn);
    if (result.ok) {
      this.model = result.value;
      this.discardTrace();
    }
    return result;
  }

  private discardTrace(): void {
    this.trace = undefined;
    this.index = 0;
  }

  public addState(id: string, isInitial = false, isFinal = false): Result<State> {
    return this.edit((model) => model.addState(id, isInitial, isFinal));
  }

  public removeState(id: string): Result<void> {
    return this.edit((model) => model.removeState(id));
  }

  public addSymbol(symbol: string): Result<void> {
    return this.edit((model) => model.addSymbol(symbol));
  }

  public addTransition(from: string, symbol: string, to: string): Result<DFATransition> {
    return this.edit((model) => model.addTransition(from, symbol, to));
  }

  public removeTransition(from: string, symbol: string): Result<void> {
    return this.edit((model) => model.removeTransition(from, symbol));
  }

  public setInitial(id: string): Result<void> {
    return this.edit((model) => model.setInitial(id));
  }

  public setFinal(id: string, flag: boolean): Result<void> {
    return this.edit((model) => model.setFinal(id, flag));
  }

  public validate(): ValidationError[] {
    return this.model.validate();
  }

  public reset(): void {
    this.model = new Automaton();
    this.discardTrace();
  }

  public table(): TransitionTableView {
    return this.model.toTable();
  }

  public saveNative(): Result<string> {
    return attempt(() => saveNative(this.model));
  }

  public loadNative(bytes: string | Uint8Array): Result<Automaton> {
    return this.replace(() => loadNative(bytes));
  }

  public loadJflap(bytes: string | Uint8Array): Result<Automaton> {
    return this.replace(() => loadJflap(bytes));
  }

  public accept(input: string): Result<boolean> {
    return attempt(() => simulator.accept(this.model, input));
  }

  /** Simulate `input` and rewind to its first step. */
  public buildTrace(input: string): Result<SimulationTrace> {
    let result = attempt(() => simulator.buildTrace(this.model, input));
    if (result.ok) {
      this.trace = result.value;
      this.index = simulator.resetIndex();
    }
    return result;
  }

  private move(to: (trace: SimulationTrace, index: number) => number): Result<TracePosition> {
    return attempt(() => {
      let trace = this.trace;
      if (trace === undefined) throw new ValidationError('No string has been simulated');
      this.index = to(trace, this.index);
      return { trace, index: this.index, config: simulator.currentConfig(trace, this.index) };
    });
  }

  public next(): Result<TracePosition> {
    return this.move(simulator.next);
  }

  public prev(): Result<TracePosition> {
    return this.move(simulator.prev);
  }

  public resetIndex(): Result<TracePosition> {
    return this.move(() => simulator.resetIndex());
  }

  public generateClosure(symbols: string, maxLength: number, includeEmpty: boolean, options?: ClosureOptions): Result<string[]> {
    return attempt(() => generateClosure(symbols, maxLength, includeEmpty, options));
  }

  public compute(input: string): Decomposition {
    return compute(input);
  }
}
