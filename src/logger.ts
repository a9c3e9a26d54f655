import * as util from 'util';
import { getConfig, LOG_LEVELS } from './config';
import type { LogLevel } from './config';

export interface Logger {
  debug(message: string, data?: object): void;
  info(message: string, data?: object): void;
  warn(message: string, data?: object): void;
  error(message: string, data?: object): void;
}

type EmittingLevel = Exclude<LogLevel, 'silent'>;

function enabled(level: EmittingLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(getConfig().logLevel);
}

/**
 * Console logger tagged with a scope, e.g. `[automata:jflap] rejected`.
 * The level is read from the engine configuration on every call, so
 * `setConfig({ logLevel })` takes effect immediately.
 */
export function createLogger(scope: string): Logger {
  let emit = (level: EmittingLevel, message: string, data?: object) => {
    if (!enabled(level)) return;
    let line = '[automata:' + scope + '] ' + message;
    if (data !== undefined) line += ' ' + util.inspect(data, false, null, false);
    console[level](line);
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}
