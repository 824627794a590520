#!/usr/bin/env node
import 'dotenv/config';
import { userInfo } from 'node:os';

import { Tradewatch } from '../core/agent.js';
import { loadConfig } from '../core/config.js';
import { createLoggerFromEnv } from '../core/logger.js';
import { installConsoleFileMirrorFromEnv } from '../core/unified-logging.js';
import { ConsoleTransport } from '../interface/console.js';

installConsoleFileMirrorFromEnv();
const logger = createLoggerFromEnv();
const config = loadConfig();

const username = process.env.TRADEWATCH_USER ?? userInfo().username;
const transport = new ConsoleTransport({ requesterId: `console:${username}`, requesterName: username });
const tradewatch = new Tradewatch(config, { logger });

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}; shutting down`);
  await tradewatch.stop();
  process.exit(0);
}

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
});

tradewatch
  .start(transport)
  .then(() => tradewatch.stop())
  .catch((error: unknown) => {
    logger.error('Gateway stopped with an error', error);
    process.exitCode = 1;
  });
