#!/usr/bin/env node

import pkg from '../package.json';
import { ClassicMacMcpServer } from './server';
import { loadConfig } from './utils/config';
import { formatErrorForResponse } from './utils/error';
import { createLogger, setDefaultLogLevel } from './utils/logger';

async function main() {
  const args = process.argv.slice(2);
  if (args.includes('--version') || args.includes('-v') || args.includes('-V')) {
    console.log(pkg.version);
    return;
  }

  const config = loadConfig();
  setDefaultLogLevel(config.logLevel);

  const server = new ClassicMacMcpServer({ config, logger: createLogger('server') });
  const shutdown = () => {
    server
      .close()
      .catch(error => console.error('Failed to stop cleanly:', formatErrorForResponse(error)))
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await server.run();
}

main().catch(error => {
  console.error('Failed to start server:', formatErrorForResponse(error));
  process.exit(1);
});
