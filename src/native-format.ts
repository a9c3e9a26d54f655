'use strict';

import * as jsyaml from "js-yaml";
import * as yup from 'yup';
import * as _ from 'lodash';

import Automaton from './Automaton';
import { ParseError, SchemaError, UnknownStateError, ValidationError } from './AutomatonError';
import { createLogger } from './logger';
import { decodeText, isRecord, isSymbol, splitTransitionKey, transitionKey } from './parser-utils';
import { EPSILON, NativeDocumentSchema } from './TransitionSpec';
import type { NativeDocument } from './TransitionSpec';

const log = createLogger('native');

/** The native document for `model`, without validating it first. */
export function toNativeDocument(model: Automaton): NativeDocument {
  return {
    alphabet: _.sortBy(model.alphabet),
    states: model.states.map((state) => state.id),
    initial_state: model.initialState ?? '',
    final_states: model.finalStates,
    transitions: _.fromPairs(model.transitions.map((t): [string, string] =>
      [transitionKey(t.from, t.read), t.to])),
  };
}

/**
 * Serialize a model to the native JSON document.
 * The model must pass `validate()`; otherwise a `ValidationError` listing
 * every problem is thrown.
 */
export function saveNative(model: Automaton): string {
  let problems = model.validate();
  if (problems.length)
    throw new ValidationError('Automaton is not valid', {
      validationErrors: problems.map((e) => e.message),
    });

  return JSON.stringify(toNativeDocument(model), null, 2) + '\n';
}

function parseDocument(text: string): unknown {
  try {
    // json mode: duplicate keys overwrite instead of failing
    return jsyaml.load(text, { json: true });
  } catch (e) {
    if (e instanceof jsyaml.YAMLException)
      throw new ParseError('Malformed automaton file', {
        problemValue: e.reason,
        line: e.mark ? e.mark.line + 1 : undefined,
      });
    throw e;
  }
}

function validateDocument(obj: unknown): NativeDocument {
  if (!isRecord(obj))
    throw new SchemaError('Automaton file must contain an object', { problemValue: obj });

  try {
    return NativeDocumentSchema.validateSync(obj);
  } catch (e) {
    if (e instanceof yup.ValidationError)
      throw new SchemaError('Invalid automaton file', {
        problemValue: e.path,
        validationErrors: e.errors,
      });
    throw e;
  }
}

function buildModel(doc: NativeDocument): Automaton {
  let model = new Automaton();

  doc.alphabet.forEach((symbol) => model.addSymbol(symbol));

  doc.states.forEach((id) => model.addState(id));

  if (doc.initial_state !== '') model.setInitial(doc.initial_state);

  doc.final_states.forEach((id) => model.setFinal(id, true));

  // object keys are unique, so a key repeated in the file has already been
  // reduced to its last occurrence by the parser
  _.forEach(doc.transitions, (to, key) => {
    let parts = splitTransitionKey(key);
    if (parts === undefined)
      throw new SchemaError('Transition key must have the form "state,symbol"', { problemValue: key });

    let [from, symbol] = parts;
    if (symbol !== EPSILON && !isSymbol(symbol))
      throw new SchemaError('Transition symbol must be a single character', { problemValue: key });
    if (!model.hasState(from)) throw new UnknownStateError(from);

    model.addTransition(from, symbol, to, { allowEpsilon: true });
  });

  return model;
}

/**
 * Parse a native automaton file. Nothing is returned unless the whole file
 * is well formed and every state it references is declared.
 */
export function loadNative(bytes: string | Uint8Array): Automaton {
  let doc = validateDocument(parseDocument(decodeText(bytes)));
  log.debug('native document', doc);

  try {
    return buildModel(doc);
  } catch (e) {
    log.warn('native document rejected', { error: String(e) });
    throw e;
  }
}
