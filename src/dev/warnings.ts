/**
 * Dev-only warnings
 */

import { isProduction } from './config';
import { logger } from './logger';

/** Distinct messages remembered before further warnings are suppressed. */
export const MAX_WARNINGS = 100;

const warned = new Set<string>();
let suppressed = false;

/**
 * Warn once per distinct message. Attribute bags are rebuilt on every render,
 * so the same mistake would otherwise flood the console. Messages carry
 * caller-supplied keys, so the set is capped at `MAX_WARNINGS`; past the cap
 * one notice is logged and later messages are dropped. Production records
 * nothing.
 */
export function warnOnce(message: string): void {
  if (isProduction() || warned.has(message)) return;
  if (warned.size >= MAX_WARNINGS) {
    if (!suppressed) {
      suppressed = true;
      logger.warn(
        `[widgetry] More than ${MAX_WARNINGS} distinct warnings; further warnings are suppressed.`
      );
    }
    return;
  }
  warned.add(message);
  logger.warn(`[widgetry] ${message}`);
}

/** @internal */
export function resetWarnings(): void {
  warned.clear();
  suppressed = false;
}
