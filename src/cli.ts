/**
 * Command line flags: only the bind address can be set here
 */
import { parseArgs } from 'node:util';
import type { ConfigOverrides } from './config/ConfigManager.js';

export const USAGE = 'Usage: cf-dns-panel [--host <address>] [--port <number>]';

export function parseCliArgs(argv: string[]): ConfigOverrides {
  const { values } = parseArgs({
    args: argv,
    options: {
      host: { type: 'string', short: 'H' },
      port: { type: 'string', short: 'p' },
    },
    strict: true,
    allowPositionals: false,
  });

  const overrides: ConfigOverrides = {};
  if (values.host !== undefined) {
    overrides.host = values.host;
  }
  if (values.port !== undefined) {
    const port = Number(values.port);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new Error(`Invalid port: ${values.port}`);
    }
    overrides.port = port;
  }
  return overrides;
}
