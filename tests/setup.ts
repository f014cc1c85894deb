/**
 * Root test setup file
 *
 * Runs before every test file. Keeps the winston console transport quiet and
 * file transports off so test runs leave nothing behind on disk.
 */

import { vi } from 'vitest';

process.env.LOG_FILE = 'false';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';

global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};
