/**
 * Test setup and configuration
 */

import * as dotenv from 'dotenv';
import { afterEach, vi } from 'vitest';

// Load test environment variables
dotenv.config({ path: '.env.test' });

// Set test environment
process.env['NODE_ENV'] = 'test';
process.env['LOG_LEVEL'] = 'error';
process.env['PAPER_TRADING'] = 'true';
process.env['TARGET_ADDRESS'] = '0x1111111111111111111111111111111111111111';

afterEach(() => {
  vi.useRealTimers();
});
