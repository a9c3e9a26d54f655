'use strict';

import * as _ from 'lodash';
import {
  DuplicateStateError,
  NonDeterministicTransitionError,
  UnknownStateError,
  ValidationError,
} from './AutomatonError';
import { createLogger } from './logger';
import { isSymbol, transitionKey } from './parser-utils';
import { EPSILON } from './TransitionSpec';
import type { DFATransition, State } from './TransitionSpec';

const log = createLogger('model');

export interface AddTransitionOptions {
  /** Accept the empty (epsilon) symbol. Only the file loaders set this. */
  allowEpsilon?: boolean;
}

export interface TransitionTableRow {
  state: string;
  /** state id followed by ` (I)` / ` (F)` markers */
  label: string;
  /** one cell per column of `symbols`: the target id, or `-` */
  targets: string[];
}

export interface TransitionTableView {
  symbols: string[];
  rows: TransitionTableRow[];
}

function checkStateId(raw: string): string {
  let id = raw.trim();
  if (id === '')
    throw new ValidationError('State id must not be empty', { problemValue: raw });
  if (id.includes(','))
    throw new ValidationError('State id must not contain ","', { problemValue: raw });
  return id;
}

/**
 * A deterministic finite automaton under construction.
 *
 * Every mutation keeps the model consistent: at most one initial state,
 * final states and transition endpoints are always declared states, and
 * each (state, symbol) pair has at most one target.
 */
export default class Automaton {
  private readonly stateIds = new Set<string>();
  private readonly symbols = new Set<string>();
  private readonly acceptStates = new Set<string>();
  // from -> symbol -> to
  private readonly delta = new Map<string, Map<string, string>>();
  private initial: string | undefined;

  public get states(): State[] {
    return [...this.stateIds].map((id) => ({
      id,
      isInitial: id === this.initial,
      isFinal: this.acceptStates.has(id),
    }));
  }

  public get alphabet(): string[] {
    return [...this.symbols];
  }

  public get initialState(): string | undefined {
    return this.initial;
  }

  public get finalStates(): string[] {
    return [...this.stateIds].filter((id) => this.acceptStates.has(id));
  }

  /** All transitions, grouped by source state in declaration order. */
  public get transitions(): DFATransition[] {
    return _.flatMap([...this.stateIds], (from) =>
      [...(this.delta.get(from) || new Map<string, string>())]
        .map(([read, to]) => ({ from, read, to })));
  }

  public get isEmpty(): boolean {
    return this.stateIds.size === 0 && this.symbols.size === 0;
  }

  public hasState(id: string): boolean {
    return this.stateIds.has(id);
  }

  public isFinal(id: string): boolean {
    return this.acceptStates.has(id);
  }

  public target(from: string, symbol: string): string | undefined {
    return this.delta.get(from)?.get(symbol);
  }

  public transition(from: string, symbol: string): DFATransition | undefined {
    let to = this.target(from, symbol);
    return to === undefined ? undefined : { from, read: symbol, to };
  }

  private requireState(id: string): void {
    if (!this.stateIds.has(id)) {
      log.debug('unknown state', { id });
      throw new UnknownStateError(id);
    }
  }

  public addState(id: string, isInitial = false, isFinal = false): State {
    let checked = checkStateId(id);
    if (this.stateIds.has(checked)) {
      log.debug('duplicate state rejected', { id: checked });
      throw new DuplicateStateError(checked);
    }

    this.stateIds.add(checked);
    this.delta.set(checked, new Map());
    // assigning a new initial state replaces the previous one
    if (isInitial) this.initial = checked;
    if (isFinal) this.acceptStates.add(checked);

    return { id: checked, isInitial, isFinal };
  }

  public removeState(id: string): void {
    this.requireState(id);

    this.stateIds.delete(id);
    this.acceptStates.delete(id);
    this.delta.delete(id);
    if (this.initial === id) this.initial = undefined;

    this.delta.forEach((out) => {
      [...out].forEach(([symbol, to]) => {
        if (to === id) out.delete(symbol);
      });
    });
  }

  public setInitial(id: string): void {
    this.requireState(id);
    this.initial = id;
  }

  public setFinal(id: string, flag: boolean): void {
    this.requireState(id);
    if (flag) this.acceptStates.add(id);
    else this.acceptStates.delete(id);
  }

  public addSymbol(symbol: string): void {
    if (!isSymbol(symbol))
      throw new ValidationError('Symbol must be a single character', { problemValue: symbol });
    this.symbols.add(symbol);
  }

  /**
   * Map `(from, symbol)` to `to`. Re-adding the same mapping is a no-op;
   * mapping the pair to a different target throws and leaves the table as
   * it was. A symbol not yet in the alphabet is added to it.
   */
  public addTransition(from: string, symbol: string, to: string, options: AddTransitionOptions = {}): DFATransition {
    this.requireState(from);
    this.requireState(to);

    let epsilon = symbol === EPSILON;
    if (epsilon && !options.allowEpsilon)
      throw new ValidationError('Epsilon transitions are not allowed in a DFA', {
        problemValue: transitionKey(from, symbol),
      });
    if (!epsilon && !isSymbol(symbol))
      throw new ValidationError('Symbol must be a single character', { problemValue: symbol });

    let out = this.delta.get(from) || new Map<string, string>();
    let existing = out.get(symbol);
    if (existing !== undefined && existing !== to) {
      log.debug('non-deterministic transition rejected', { from, symbol, existing, to });
      throw new NonDeterministicTransitionError(from, symbol, existing, to);
    }

    if (!epsilon) this.symbols.add(symbol);
    out.set(symbol, to);
    this.delta.set(from, out);

    return { from, read: symbol, to };
  }

  public removeTransition(from: string, symbol: string): void {
    this.requireState(from);
    this.delta.get(from)?.delete(symbol);
  }

  /** Report what keeps the model from being simulated or saved. */
  public validate(): ValidationError[] {
    let errors: ValidationError[] = [];

    if (this.initial === undefined)
      errors.push(new ValidationError('No initial state defined'));

    this.transitions
      .filter((t) => t.read === EPSILON)
      .forEach((t) => errors.push(new ValidationError('Epsilon transition is not allowed in a DFA', {
        problemValue: transitionKey(t.from, t.read),
        state: t.from,
      })));

    return errors;
  }

  public reset(): void {
    this.stateIds.clear();
    this.symbols.clear();
    this.acceptStates.clear();
    this.delta.clear();
    this.initial = undefined;
  }

  public toTable(): TransitionTableView {
    let symbols = _.sortBy(this.alphabet);

    let rows = this.states.map((state) => ({
      state: state.id,
      label: state.id + (state.isInitial ? ' (I)' : '') + (state.isFinal ? ' (F)' : ''),
      targets: symbols.map((symbol) => this.target(state.id, symbol) ?? '-'),
    }));

    return { symbols, rows };
  }

  public toString(): string {
    return this.transitions
      .map((t) => t.from + ' --' + (t.read === EPSILON ? 'ε' : t.read) + '--> ' + t.to)
      .join('\n');
  }
}
