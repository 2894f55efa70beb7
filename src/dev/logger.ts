/**
 * Centralized logger interface
 * - Keeps production builds silent for debug/warn/info messages
 * - Ensures consistent behavior across the codebase
 * - Protects against missing `console` in some environments
 */

import { isProduction } from './config';

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

function callConsole(method: ConsoleMethod, args: unknown[]): void {
  if (typeof console === 'undefined') return;
  const fn = console[method];
  if (typeof fn !== 'function') return;
  try {
    fn.apply(console, args);
  } catch (err) {
    // Logging never throws into the caller.
    if (method !== 'error') callConsole('error', ['[widgetry] logger failed', err]);
  }
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('debug', args);
  },

  info: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('info', args);
  },

  warn: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('warn', args);
  },

  error: (...args: unknown[]) => {
    callConsole('error', args);
  },
};
