import { afterEach } from 'vitest';
import { logger } from './src/logger.js';

process.env.NODE_ENV = 'test';

// Keep test output readable; individual tests opt back in when they assert on log lines.
logger.setMinLevel('error');

afterEach(() => {
  logger.clear();
});
