'use strict';

import * as _ from 'lodash';
import type Automaton from './Automaton';
import { NoInitialStateError } from './AutomatonError';
import DFA from './DFA';
import InputTape, { formatTape } from './InputTape';
import { toSymbols } from './parser-utils';

export interface Configuration {
  step: number;
  state: string;
  /** number of input symbols consumed so far */
  consumed: number;
  remaining: string;
}

export interface SimulationTrace {
  input: string;
  configurations: readonly Configuration[];
  /** halted before the end of the input */
  stuck: boolean;
  /** the symbol that had no transition, when stuck */
  stuckOn?: string;
  accepted: boolean;
}

function snapshot(machine: DFA, step: number): Configuration {
  return {
    step,
    state: machine.state,
    consumed: machine.consumed,
    remaining: machine.remaining,
  };
}

/**
 * Replay `input` from the initial state, one configuration per consumed
 * symbol. A missing transition ends the trace early; that is a normal,
 * rejecting outcome and not an error.
 */
export function buildTrace(model: Automaton, input: string): SimulationTrace {
  let start = model.initialState;
  if (start === undefined) throw new NoInitialStateError();

  let machine = new DFA(
    (from, symbol) => model.transition(from, symbol),
    start,
    model.finalStates,
    new InputTape(input));

  let configurations = [snapshot(machine, 0)];
  while (machine.step()) {
    configurations.push(snapshot(machine, configurations.length));
  }

  let stuck = machine.isStuck;
  let trace: SimulationTrace = {
    input,
    configurations,
    stuck,
    accepted: machine.isAccepting,
  };
  if (stuck) trace.stuckOn = toSymbols(machine.remaining)[0];

  return trace;
}

export function accept(model: Automaton, input: string): boolean {
  return buildTrace(model, input).accepted;
}

function clamp(trace: SimulationTrace, index: number): number {
  return _.clamp(Math.trunc(index), 0, trace.configurations.length - 1);
}

/** The configuration at `index`, clamped to the ends of the trace. */
export function currentConfig(trace: SimulationTrace, index: number): Configuration {
  return trace.configurations[clamp(trace, index)];
}

export function next(trace: SimulationTrace, index: number): number {
  return clamp(trace, index + 1);
}

export function prev(trace: SimulationTrace, index: number): number {
  return clamp(trace, index - 1);
}

export function resetIndex(): number {
  return 0;
}

export function isLastStep(trace: SimulationTrace, index: number): boolean {
  return clamp(trace, index) === trace.configurations.length - 1;
}

/**
 * One line per step up to `index`, the current one marked with an arrow:
 *
 *     Step 0: State: q0
 *     Step 1: → State: q1
 */
export function describeTrace(trace: SimulationTrace, index: number): string[] {
  let current = clamp(trace, index);
  return _.take(trace.configurations, current + 1)
    .map((config) =>
      'Step ' + config.step + ': ' + (config.step === current ? '→ ' : '') + 'State: ' + config.state);
}

/** The input with the next symbol to be read in brackets, e.g. `b[a]`. */
export function highlightPosition(trace: SimulationTrace, index: number): string {
  return formatTape(toSymbols(trace.input), currentConfig(trace, index).consumed);
}
