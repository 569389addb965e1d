/**
 * Module: config
 *
 * Engine settings with defaults, overrides and `TURNSTACK_*` environment
 * variables. Bad values are rejected as `ConfigurationError`.
 */
import { DEFAULT_CHOICE_LOCALES, type ChoiceLocaleTable } from './choices';
import { ConfigurationError } from './errors';

export type EngineConfig = Readonly<{
  /** A turn that executes more steps than this faults. */
  maxStepsPerTurn: number;
  /** Recognizer results scoring below this become `unknownIntent`. */
  minIntentScore: number;
  /** Used when the incoming activity carries no locale. */
  defaultLocale: string;
  choiceLocales: ChoiceLocaleTable;
  /** Directory for `DiskFileStorage`. */
  storageDir: string;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  maxStepsPerTurn: 1000,
  minIntentScore: 0.5,
  defaultLocale: 'en-us',
  choiceLocales: DEFAULT_CHOICE_LOCALES,
  storageDir: '.turnstack/conversations',
});

export function resolveEngineConfig(overrides?: Partial<EngineConfig>): EngineConfig {
  const config: EngineConfig = Object.freeze({ ...DEFAULT_ENGINE_CONFIG, ...overrides });
  if (!Number.isInteger(config.maxStepsPerTurn) || config.maxStepsPerTurn <= 0) {
    throw new ConfigurationError(
      `Invalid maxStepsPerTurn: expected a positive integer (got ${config.maxStepsPerTurn})`,
    );
  }
  if (!(config.minIntentScore >= 0 && config.minIntentScore <= 1)) {
    throw new ConfigurationError(
      `Invalid minIntentScore: expected a number in [0, 1] (got ${config.minIntentScore})`,
    );
  }
  if (!config.defaultLocale.trim()) {
    throw new ConfigurationError('Invalid defaultLocale: expected a non-empty string');
  }
  if (!config.storageDir.trim()) {
    throw new ConfigurationError('Invalid storageDir: expected a non-empty string');
  }
  return config;
}

/** Every environment variable turnstack reads. `TURNSTACK_LOG_LEVEL` belongs to `log.ts`. */
export const ENGINE_ENV_KEYS: ReadonlySet<string> = new Set([
  'TURNSTACK_MAX_STEPS_PER_TURN',
  'TURNSTACK_MIN_INTENT_SCORE',
  'TURNSTACK_DEFAULT_LOCALE',
  'TURNSTACK_STORAGE_DIR',
  'TURNSTACK_LOG_LEVEL',
]);

function readNumberEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`Invalid ${name}: expected a number (got '${raw}')`);
  }
  return value;
}

function readStringEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

/**
 * Environment first, explicit overrides last:
 * `TURNSTACK_MAX_STEPS_PER_TURN`, `TURNSTACK_MIN_INTENT_SCORE`,
 * `TURNSTACK_DEFAULT_LOCALE`, `TURNSTACK_STORAGE_DIR`.
 */
export function loadEngineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides?: Partial<EngineConfig>,
): EngineConfig {
  const fromEnv: { -readonly [K in keyof EngineConfig]?: EngineConfig[K] } = {};
  const maxSteps = readNumberEnv(env, 'TURNSTACK_MAX_STEPS_PER_TURN');
  if (maxSteps !== undefined) fromEnv.maxStepsPerTurn = maxSteps;
  const minScore = readNumberEnv(env, 'TURNSTACK_MIN_INTENT_SCORE');
  if (minScore !== undefined) fromEnv.minIntentScore = minScore;
  const locale = readStringEnv(env, 'TURNSTACK_DEFAULT_LOCALE');
  if (locale !== undefined) fromEnv.defaultLocale = locale;
  const storageDir = readStringEnv(env, 'TURNSTACK_STORAGE_DIR');
  if (storageDir !== undefined) fromEnv.storageDir = storageDir;
  return resolveEngineConfig({ ...fromEnv, ...overrides });
}
