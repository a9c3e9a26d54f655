import * as _ from 'lodash';
import Automaton from '../src/Automaton';
import { getConfig, setConfig } from '../src/config';
import type { EngineConfig } from '../src/config';

/**
 * q0 (initial), q1 (final):
 *   q0 -a-> q1, q1 -a-> q1, q0 -b-> q0, q1 -b-> q0
 * Accepts the strings ending in `a`.
 */
export function endsWithA(): Automaton {
  let model = new Automaton();
  model.addState('q0', true, false);
  model.addState('q1', false, true);
  model.addTransition('q0', 'a', 'q1');
  model.addTransition('q1', 'a', 'q1');
  model.addTransition('q0', 'b', 'q0');
  model.addTransition('q1', 'b', 'q0');
  return model;
}

/** Compare everything observable about two models. */
export function snapshotOf(model: Automaton) {
  return {
    alphabet: _.sortBy(model.alphabet),
    states: model.states,
    initialState: model.initialState,
    finalStates: model.finalStates,
    transitions: _.sortBy(model.transitions, ['from', 'read']),
  };
}

/** matcher for assert.throws: an error of the given name and reason */
export function errorLike(name: string, reason?: string) {
  return _.conforms({
    name: _.partial(_.isEqual, name),
    reason: (r: string) => reason === undefined || r === reason,
  });
}

/** Silence logging for a suite; any config the suite changes is restored after it. */
export function quietLogs(): void {
  let saved: EngineConfig | undefined;
  before(function () {
    saved = getConfig();
    setConfig({ logLevel: 'silent' });
  });
  after(function () {
    if (saved !== undefined) setConfig(saved);
  });
}
