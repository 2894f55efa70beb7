/**
 * Invariant assertion utilities
 *
 * Core principle: fail fast when an internal contract is violated.
 */

/**
 * Assert a condition; throw with context if false
 * @internal
 */
export function invariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    const contextStr = context ? '\n' + JSON.stringify(context, null, 2) : '';
    throw new Error(`[widgetry invariant] ${message}${contextStr}`);
  }
}
