import type { DFATransition } from "./TransitionSpec";

export type { TransitionLUT } from "./TransitionSpec";

export abstract class StateAutomaton<T extends DFATransition> {
  public abstract get state(): string;

  public abstract toString(): string;

  /**
   * Step to the next configuration according to the transition function.
   * @return {boolean} true if successful (the transition is defined),
   *   false otherwise (machine halted)
   */
  public abstract step(): boolean;

  /** The transition the next `step()` would take, if any. */
  public abstract get nextInstruction(): T | undefined;

  public abstract get isHalted(): boolean;
}
