'use strict';

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import * as yup from 'yup';
import * as _ from 'lodash';

import Automaton from './Automaton';
import { ParseError, SchemaError, UnknownStateError } from './AutomatonError';
import { createLogger } from './logger';
import { collectElements, decodeText, isRecord } from './parser-utils';
import type { PlainObject } from './parser-utils';
import { JflapStateSchema, JflapTransitionSchema } from './TransitionSpec';
import type { JflapState, JflapTransition } from './TransitionSpec';

const log = createLogger('jflap');

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  // a <read> of one space is a real symbol
  trimValues: false,
});

function trimmed(value: unknown): unknown {
  return _.isString(value) ? value.trim() : value;
}

function validateRecord<T>(what: string, record: object, validate: (record: object) => T): T {
  try {
    return validate(record);
  } catch (e) {
    if (e instanceof yup.ValidationError)
      throw new SchemaError('Invalid JFLAP ' + what, {
        problemValue: record,
        validationErrors: e.errors,
      });
    throw e;
  }
}

function parseStructure(text: string): PlainObject {
  let valid = XMLValidator.validate(text);
  if (valid !== true)
    throw new ParseError('Malformed JFLAP file', {
      problemValue: valid.err.msg,
      line: valid.err.line,
      column: valid.err.col,
    });

  let doc: unknown = xmlParser.parse(text);
  let structure = isRecord(doc) ? doc.structure : undefined;
  if (!isRecord(structure))
    throw new SchemaError('JFLAP file has no <structure> element');

  // older files omit <type>; anything else must be a finite automaton
  let type = trimmed(structure.type);
  if (type !== undefined && type !== 'fa')
    throw new SchemaError('JFLAP file does not describe a finite automaton', { problemValue: type });

  return structure;
}

function readState(node: PlainObject): JflapState {
  let record = {
    id: trimmed(node['@_id']),
    name: node['@_name'],
    initial: _.has(node, 'initial'),
    final: _.has(node, 'final'),
  };
  return validateRecord('state', record, (r) => JflapStateSchema.validateSync(r));
}

function readTransition(node: PlainObject): JflapTransition {
  let record = { from: trimmed(node.from), to: trimmed(node.to), read: node.read };
  return validateRecord('transition', record, (r) => JflapTransitionSchema.validateSync(r));
}

function buildModel(states: JflapState[], transitions: JflapTransition[]): Automaton {
  let model = new Automaton();
  // JFLAP transitions refer to states by id; the model knows them by name
  let names = new Map<string, string>();

  states.forEach((state) => {
    if (names.has(state.id))
      throw new SchemaError('Duplicate JFLAP state id', { problemValue: state.id });
    let added = model.addState(state.name || state.id, state.initial, state.final);
    names.set(state.id, added.id);
  });

  let nameOf = (id: string): string => {
    let name = names.get(id);
    if (name === undefined) throw new UnknownStateError(id);
    return name;
  };

  // re-applied one by one so the first conflicting (from, symbol) pair
  // rejects the whole file
  transitions.forEach((t) => {
    model.addTransition(nameOf(t.from), t.read, nameOf(t.to), { allowEpsilon: true });
  });

  return model;
}

/**
 * Load a JFLAP `.jff` finite automaton. A `<read>` that is absent or empty
 * is an epsilon transition. Non-deterministic files are rejected as a whole
 * with `NonDeterministicTransitionError`.
 */
export function loadJflap(bytes: string | Uint8Array): Automaton {
  let structure = parseStructure(decodeText(bytes));

  let states = collectElements(structure, 'state').map(readState);
  let transitions = collectElements(structure, 'transition').map(readTransition);
  log.debug('jflap document', { states: states.length, transitions: transitions.length });

  try {
    return buildModel(states, transitions);
  } catch (e) {
    log.warn('jflap document rejected', { error: String(e) });
    throw e;
  }
}
