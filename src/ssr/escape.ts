/**
 * HTML escaping utilities for the string renderer
 *
 * Centralizes text and attribute escaping so element and attribute
 * rendering share one definition of "safe".
 */

// HTML5 void elements that don't have closing tags
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

const TEXT_ESCAPE_TEST_RE = /[&<>]/;
const TEXT_ESCAPE_RE = /[&<>]/g;
const ATTR_ESCAPE_TEST_RE = /[&"'<>]/;
const ATTR_ESCAPE_RE = /[&"'<>]/g;

const CSS_UNSAFE_RE = /[{}<>\\]/g;
const CSS_DANGEROUS_FN_RE = /(?:url|expression|javascript)\s*\(/i;

const ENTITIES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

function mapEscape(ch: string): string {
  return ENTITIES[ch] ?? ch;
}

/**
 * Escape HTML special characters in text content
 */
export function escapeText(text: string): string {
  if (!TEXT_ESCAPE_TEST_RE.test(text)) return text;
  return text.replace(TEXT_ESCAPE_RE, mapEscape);
}

/**
 * Escape HTML special characters in attribute values
 */
export function escapeAttr(value: string): string {
  if (!ATTR_ESCAPE_TEST_RE.test(value)) return value;
  return value.replace(ATTR_ESCAPE_RE, mapEscape);
}

function escapeCssValue(value: string): string {
  if (value.includes('(') && CSS_DANGEROUS_FN_RE.test(value)) return '';
  return value.replace(CSS_UNSAFE_RE, '');
}

/**
 * Convert a style object to a CSS declaration string. camelCase keys become
 * kebab-case; custom properties (`--x`) are kept as written.
 */
export function styleObjToCss(value: unknown): string | null {
  if (!value || typeof value !== 'object') return null;
  let out = '';
  for (const [k, v] of Object.entries(value)) {
    if (v === null || v === undefined || v === false) continue;
    const prop = k.startsWith('--')
      ? k
      : k.replace(/[A-Z]/g, (m) => `-${m.toLowerCase()}`);
    const safeValue = escapeCssValue(String(v));
    if (safeValue) out += `${prop}:${safeValue};`;
  }
  return out;
}
