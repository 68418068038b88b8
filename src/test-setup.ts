// Test setup - runs before each test file
import { loadEnv } from '@src/lib/env/load-env.js';
import { FactoryEnv } from '@src/lib/factory-env.js';
import { logger } from '@src/lib/logger.js';

// Load environment variables from .env file, if there is one
loadEnv();

// Keep the module-level logger at the configured threshold
logger.setLevel(FactoryEnv.read().logLevel);
