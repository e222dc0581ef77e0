import { config as loadEnv } from 'dotenv';

import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { createContainer } from './container.js';
import { createLogger } from './logger.js';

// Load environment variables
loadEnv();

const start = async () => {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  try {
    const container = await createContainer(config, logger);
    const app = await buildApp(container, {
      logLevel: config.logLevel,
      rateLimit: config.rateLimit,
    });

    await app.listen({ port: config.port, host: config.host });
    logger.info(`ScholarlyTrust API running on http://${config.host}:${config.port}`);
  } catch (err) {
    logger.fatal({ err }, 'Failed to start');
    process.exit(1);
  }
};

void start();
