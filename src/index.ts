#!/usr/bin/env node

import { loadConfigFromEnv } from './config.js';
import { createLogger } from './logger.js';
import { InvestorAnalysisMCPServer } from './server.js';

const config = loadConfigFromEnv();
const logger = createLogger({ level: config.logLevel });

const server = new InvestorAnalysisMCPServer({ config, logger });
server.run().catch(error => {
  logger.fatal({ err: error }, 'failed to start server');
  process.exit(1);
});
