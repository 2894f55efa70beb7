/**
 * Environment-driven configuration.
 *
 * - `NODE_ENV=production` silences development warnings
 * - `WIDGETRY_DEBUG=1|true` turns on compile/render debug logging
 *
 * Read lazily so tests can flip the environment between cases.
 */

function env(name: string): string | undefined {
  return typeof process !== 'undefined' ? process.env[name] : undefined;
}

export function isProduction(): boolean {
  return env('NODE_ENV') === 'production';
}

export function isDebugEnabled(): boolean {
  if (isProduction()) return false;
  const flag = env('WIDGETRY_DEBUG');
  return flag === '1' || flag === 'true';
}
