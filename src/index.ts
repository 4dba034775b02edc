#!/usr/bin/env node
/**
 * Cloudflare DNS Panel - Entry Point
 */
import { createApplication, logger } from './core/index.js';
import { parseCliArgs, USAGE } from './cli.js';
import type { ConfigOverrides } from './config/ConfigManager.js';

function readOverrides(): ConfigOverrides {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exit(2);
  }
}

async function main(): Promise<void> {
  const app = createApplication({ overrides: readOverrides() });

  try {
    await app.start();
  } catch (error) {
    logger.fatal({ error }, 'Failed to start DNS panel');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
