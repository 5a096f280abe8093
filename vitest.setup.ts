/**
 * Shared Vitest setup: keep test output quiet unless a test opts in.
 */

import { beforeEach } from 'vitest';
import { setLogLevel } from './src/telemetry/logger.js';

beforeEach(() => {
  setLogLevel('silent');
});
