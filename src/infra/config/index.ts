export {
  parseEnv,
  createConfig,
  EnvSchema,
  DEFAULT_PATTERNS_FILE,
  DEFAULT_EXTENSIONS_FILE,
  type Env,
  type AppConfig,
} from './env.js';
