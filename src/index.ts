#!/usr/bin/env node

/**
 * CLI entry point
 * Reads source URLs from stdin and writes the generated wordlist
 */

import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { nodeCliIo, runCli } from './modules/wordlist/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);
  const logger = createLogger(config.logger);

  process.exitCode = await runCli(process.argv.slice(2), { io: nodeCliIo, config, logger });
};

await main().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
