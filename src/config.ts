import * as yup from 'yup';
import { ValidationError } from './AutomatonError';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const configSchema = yup.object({
  closureLimit: yup
    .number()
    .integer('closure limit must be an integer')
    .min(1, 'closure limit must be at least 1')
    .default(100000),

  logLevel: yup
    .mixed<LogLevel>()
    .oneOf([...LOG_LEVELS], 'log level must be one of ' + JSON.stringify(LOG_LEVELS))
    .default('warn'),
});

export type EngineConfig = yup.InferType<typeof configSchema>;

/**
 * Build the engine configuration from environment variables.
 *
 * `AUTOMATA_CLOSURE_LIMIT` caps the number of strings a closure run may
 * produce; `AUTOMATA_LOG_LEVEL` picks the console log level.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  let raw = {
    closureLimit: env.AUTOMATA_CLOSURE_LIMIT,
    logLevel: env.AUTOMATA_LOG_LEVEL,
  };

  try {
    return configSchema.validateSync(raw, { abortEarly: false });
  } catch (e) {
    if (e instanceof yup.ValidationError)
      throw new ValidationError('Invalid engine configuration', {
        problemValue: raw,
        validationErrors: e.errors,
      });
    throw e;
  }
}

let current: EngineConfig | undefined;

export function getConfig(): EngineConfig {
  if (current === undefined) current = loadConfig();
  return current;
}

export function setConfig(overrides: Partial<EngineConfig>): EngineConfig {
  current = { ...getConfig(), ...overrides };
  return current;
}
