/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { fileURLToPath } from 'node:url';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/** Pattern library shipped with the tool */
export const DEFAULT_PATTERNS_FILE = fileURLToPath(
  new URL('../../../data/patterns.json', import.meta.url)
);

/** Extension catalogue shipped with the tool */
export const DEFAULT_EXTENSIONS_FILE = fileURLToPath(
  new URL('../../../data/extensions.json', import.meta.url)
);

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'warn' }
  ),

  // Sources
  FBACK_PATTERNS_FILE: Type.Optional(Type.String({ minLength: 1 })),
  FBACK_EXTENSIONS_FILE: Type.Optional(Type.String({ minLength: 1 })),

  // Generation
  FBACK_MAX_RESULTS: Type.Optional(Type.Integer({ minimum: 1 })),
});

export type Env = Static<typeof EnvSchema>;

const optionalString = (value: string | undefined): string | undefined =>
  value !== undefined && value !== '' ? value : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const maxResults = optionalString(env['FBACK_MAX_RESULTS']);

  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'warn',
    FBACK_PATTERNS_FILE: optionalString(env['FBACK_PATTERNS_FILE']),
    FBACK_EXTENSIONS_FILE: optionalString(env['FBACK_EXTENSIONS_FILE']),
    FBACK_MAX_RESULTS: maxResults !== undefined ? Number(maxResults) : undefined,
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  sources: {
    patternsFile: env.FBACK_PATTERNS_FILE ?? DEFAULT_PATTERNS_FILE,
    extensionsFile: env.FBACK_EXTENSIONS_FILE ?? DEFAULT_EXTENSIONS_FILE,
  },
  generation: {
    /** Cap on unique candidates per category (unset means no cap) */
    maxResults: env.FBACK_MAX_RESULTS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
