/**
 * Centralized Vitest Setup for Tactician
 *
 * Logging goes to stderr and would interleave with the reporter output, so it
 * is silenced before each test. Set TACTICIAN_TEST_LOGS=1 to see it.
 */

import { beforeEach } from 'vitest';
import { setLogLevel } from './src/telemetry/logger.js';

const SHOW_LOGS = process.env.TACTICIAN_TEST_LOGS === '1';

beforeEach(() => {
  setLogLevel(SHOW_LOGS ? 'debug' : 'silent');
});
