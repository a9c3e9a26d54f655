import * as assert from 'assert';
import * as _ from 'lodash';

import { AutomatonError, DuplicateStateError } from '../src/AutomatonError';
import { getConfig, loadConfig, setConfig } from '../src/config';
import { createLogger } from '../src/logger';

describe('Configuration', function() {
  it('defaults', function () {
    assert.deepStrictEqual(loadConfig({}), { closureLimit: 100000, logLevel: 'warn' });
  });

  it('from the environment', function () {
    let config = loadConfig({ AUTOMATA_CLOSURE_LIMIT: '250', AUTOMATA_LOG_LEVEL: 'debug' });
    assert.deepStrictEqual(config, { closureLimit: 250, logLevel: 'debug' });
  });

  it('invalid values', function () {
    assert.throws(() => loadConfig({ AUTOMATA_CLOSURE_LIMIT: '0', AUTOMATA_LOG_LEVEL: 'loud' }), _.conforms({
      name: _.partial(_.isEqual, 'ValidationError'),
      reason: _.partial(_.isEqual, 'Invalid engine configuration'),
      details: _.conforms({
        validationErrors: (errors: string[]) => errors.length === 2,
      }),
    }));
  });

  it('setConfig overrides', function () {
    let before = getConfig();
    try {
      assert.strictEqual(setConfig({ closureLimit: 5 }).closureLimit, 5);
      assert.strictEqual(getConfig().logLevel, before.logLevel);
    } finally {
      setConfig(before);
    }
  });
});

describe('Logger', function() {
  let lines: string[];
  let original = console.warn;
  let before = getConfig();

  beforeEach(function () {
    lines = [];
    console.warn = (line: string) => { lines.push(line); };
  });

  afterEach(function () {
    console.warn = original;
    setConfig(before);
  });

  it('writes at or above the configured level', function () {
    setConfig({ logLevel: 'warn' });
    let log = createLogger('test');
    log.warn('closure refused', { limit: 3 });
    log.info('not shown');

    assert.deepStrictEqual(lines, ['[automata:test] closure refused { limit: 3 }']);
  });

  it('silent', function () {
    setConfig({ logLevel: 'silent' });
    createLogger('test').warn('nothing');
    assert.deepStrictEqual(lines, []);
  });
});

describe('AutomatonError', function() {
  it('message carries the offending value', function () {
    let e = new DuplicateStateError('q0');
    assert.strictEqual(e.message, 'State already exists: "q0"');
    assert.strictEqual(e.name, 'DuplicateStateError');
    assert.ok(e instanceof DuplicateStateError);
    assert.ok(e instanceof AutomatonError);
    assert.ok(e instanceof Error);
  });

  it('nested messages', function () {
    let e = new AutomatonError('Invalid', { validationErrors: ['a is required', 'b is required'] });
    assert.strictEqual(e.message, 'Invalid\n  - a is required\n  - b is required');
  });
});
