import { beforeEach, afterEach } from 'vitest';
import { resetWarnings } from '../src/dev/warnings';

// Ensure tests run in a deterministic dev-like environment regardless of
// the shell's NODE_ENV (bench commands set it to 'production').
const BASE = 'development';

beforeEach(() => {
  process.env.NODE_ENV = BASE;
  delete process.env.WIDGETRY_DEBUG;
  resetWarnings();
});

afterEach(() => {
  process.env.NODE_ENV = BASE;
  delete process.env.WIDGETRY_DEBUG;
});
