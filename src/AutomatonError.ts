'use strict';

import * as _ from 'lodash';

export interface ErrorDetails {
  problemValue?: unknown;
  state?: string;
  symbol?: string;
  validationErrors?: string[];
  [key: string]: unknown;
}

// reason, the offending value, then one indented line per nested message
function formatMessage(reason: string, details: ErrorDetails): string {
  let problemValue = _.isNil(details.problemValue)
    ? ''
    : ': ' + JSON.stringify(details.problemValue);
  let nested = _.map(details.validationErrors, (e) => '  - ' + e);

  return [reason + problemValue, ...nested].join('\n');
}

export class AutomatonError extends Error {
  public readonly reason: string;
  public readonly details: ErrorDetails;

  constructor (reason: string, details?: ErrorDetails) {
    super(formatMessage(reason, details || {}));

    this.name = 'AutomatonError';

    this.reason = reason;
    this.details = details || {};

    // https://github.com/Microsoft/TypeScript-wiki/blob/master/Breaking-Changes.md#extending-built-ins-like-error-array-and-map-may-no-longer-work
    // Set the prototype explicitly.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateStateError extends AutomatonError {
  constructor (state: string) {
    super('State already exists', { problemValue: state, state });
    this.name = 'DuplicateStateError';
  }
}

export class UnknownStateError extends AutomatonError {
  constructor (state: string) {
    super('No such state', { problemValue: state, state });
    this.name = 'UnknownStateError';
  }
}

export class NonDeterministicTransitionError extends AutomatonError {
  public readonly existingTarget: string;
  public readonly rejectedTarget: string;

  constructor (state: string, symbol: string, existingTarget: string, rejectedTarget: string) {
    super('A transition on this symbol already leaves the state', {
      problemValue: state + ',' + symbol,
      state,
      symbol,
    });
    this.name = 'NonDeterministicTransitionError';
    this.existingTarget = existingTarget;
    this.rejectedTarget = rejectedTarget;
  }
}

export class NoInitialStateError extends AutomatonError {
  constructor () {
    super('No initial state defined');
    this.name = 'NoInitialStateError';
  }
}

export class ParseError extends AutomatonError {
  constructor (reason: string, details?: ErrorDetails) {
    super(reason, details);
    this.name = 'ParseError';
  }
}

export class SchemaError extends AutomatonError {
  constructor (reason: string, details?: ErrorDetails) {
    super(reason, details);
    this.name = 'SchemaError';
  }
}

export class ResourceLimitError extends AutomatonError {
  public readonly projected: number;
  public readonly limit: number;

  constructor (projected: number, limit: number) {
    super('Closure would exceed the configured size limit', {
      problemValue: projected,
      limit,
    });
    this.name = 'ResourceLimitError';
    this.projected = projected;
    this.limit = limit;
  }
}

export class ValidationError extends AutomatonError {
  constructor (reason: string, details?: ErrorDetails) {
    super(reason, details);
    this.name = 'ValidationError';
  }
}

export function isAutomatonError(e: unknown): e is AutomatonError {
  return e instanceof AutomatonError;
}
