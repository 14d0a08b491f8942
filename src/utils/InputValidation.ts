/**
 * Checks for names passed in by tool callers before they reach the API server
 */

const NAMESPACE_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const RESOURCE_NAME_PATTERN = /^[a-zA-Z0-9]([-.a-zA-Z0-9]*[a-zA-Z0-9])?$/;

export const MAX_NAME_LENGTH = 253;
export const MAX_LOGGED_ARGUMENT_LENGTH = 500;

export function isValidNamespace(value: string): boolean {
  return value.length <= MAX_NAME_LENGTH && NAMESPACE_PATTERN.test(value);
}

export function isValidResourceName(value: string): boolean {
  return value.length <= MAX_NAME_LENGTH && RESOURCE_NAME_PATTERN.test(value);
}

/**
 * Make a caller-supplied value safe to log: control characters become `?`
 * and the text is capped.
 */
export function sanitizeForLog(value: string): string {
  // eslint-disable-next-line no-control-regex
  const cleaned = value.replace(/[\u0000-\u001f\u007f]/g, '?');
  return cleaned.length > MAX_LOGGED_ARGUMENT_LENGTH
    ? `${cleaned.slice(0, MAX_LOGGED_ARGUMENT_LENGTH)}...`
    : cleaned;
}

export function sanitizeArgumentsForLog(params: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (typeof params !== 'object' || params === null) return result;
  for (const [key, value] of Object.entries(params)) {
    result[sanitizeForLog(key)] = sanitizeForLog(
      typeof value === 'string' ? value : JSON.stringify(value) ?? String(value),
    );
  }
  return result;
}
