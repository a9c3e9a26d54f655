'use strict';

import InputTape from './InputTape';
import { StateAutomaton } from "./StateAutomaton";
import type { TransitionLUT } from "./StateAutomaton";
import type { DFATransition } from './TransitionSpec';

type DFATransitionLUT = TransitionLUT<DFATransition>;

export default class DFA extends StateAutomaton<DFATransition> {
  private readonly transition: DFATransitionLUT;
  private current: string;
  private readonly acceptStates: ReadonlySet<string>;
  private readonly tape: InputTape;

  /**
   * Construct a running Deterministic Finite Automaton.
   * @param transition
   *   Given the current state and symbol, returns the single transition to
   *   take, or undefined when none is defined (the machine halts).
   * @param startState   The state to start in.
   * @param acceptStates
   * @param tape         The input to consume.
   */
  constructor (transition: DFATransitionLUT, startState: string, acceptStates: Iterable<string>, tape: InputTape) {
    super();

    this.transition = transition;
    this.current = startState;
    this.acceptStates = new Set(acceptStates);
    this.tape = tape;
  }

  public get state(): string {
    return this.current;
  }

  public get consumed(): number {
    return this.tape.head;
  }

  public get remaining(): string {
    return this.tape.remaining;
  }

  public toString(): string {
    return this.current + '\n' + String(this.tape);
  }

  public step(): boolean {
    let instruct = this.nextInstruction;
    if (instruct === undefined) { return false; }

    this.current = instruct.to;
    this.tape.headRight();

    return true;
  }

  public get nextInstruction(): DFATransition | undefined {
    let symbol = this.tape.read();
    if (symbol === undefined) { return undefined; }
    return this.transition(this.current, symbol);
  }

  public get isHalted(): boolean {
    return this.nextInstruction === undefined;
  }

  /** Halted with input left over: no transition for the next symbol. */
  public get isStuck(): boolean {
    return this.isHalted && !this.tape.atEnd;
  }

  public get isAccepting(): boolean {
    return this.tape.atEnd && this.acceptStates.has(this.current);
  }
}
