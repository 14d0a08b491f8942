/**
 * Masking of secret-looking values in free text such as container logs
 */

export const DEFAULT_MASK = '*** FILTERED ***';

/**
 * Value patterns for secret-like strings
 */
export const sensitiveValueRegexes: RegExp[] = [
  /eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g, // JWT
  /ssh-(?:rsa|dss|ed25519|ecdsa)\s+[A-Za-z0-9+/=]+[^\r\n]*/gi,
  /\bAKIA[0-9A-Z]{16}\b/g, // AWS access key id
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
  /\b(?:bearer)\s+[A-Za-z0-9._~+/=-]{16,}/gi,
  /(?:postgresql|postgres|mysql|mongodb|redis|amqp):\/\/[^:\s]+:[^@\s]+@[^\s]+/gi, // URLs with creds
];

/**
 * `key: value` and `key=value` pairs whose key names a credential
 */
const keyValuePatterns: RegExp[] = [
  /\b((?:password|passwd|pwd)\s*[:=]\s*)("[^"]*"|'[^']*'|[^\s,}]+)/gi,
  /\b((?:api[_-]?key|access[_-]?key|secret[_-]?key|client[_-]?secret|auth[_-]?token|access[_-]?token|refresh[_-]?token|token|secret)\s*[:=]\s*)("[^"]*"|'[^']*'|[^\s,}]+)/gi,
];

/**
 * JSON-style `"key": value` pairs, keeping the quotes around the key
 */
const jsonKeyPatterns: RegExp[] = [
  /("(?:password|passwd|pwd)")\s*:\s*("[^"]*"|[^,}\n]+)/gi,
  /("(?:secret|token|api[_-]?key|access[_-]?key|client[_-]?secret|auth[_-]?token)")\s*:\s*("[^"]*"|[^,}\n]+)/gi,
];

/**
 * Mask sensitive values in a plain text blob
 */
export function maskTextForSensitiveValues(text: string, mask: string = DEFAULT_MASK): string {
  let output = text;

  for (const regex of jsonKeyPatterns) {
    regex.lastIndex = 0;
    output = output.replace(regex, (_match, key: string) => `${key}: "${mask}"`);
  }

  for (const regex of keyValuePatterns) {
    regex.lastIndex = 0;
    output = output.replace(regex, (_match, prefix: string) => `${prefix}${mask}`);
  }

  for (const regex of sensitiveValueRegexes) {
    regex.lastIndex = 0;
    output = output.replace(regex, mask);
  }

  return output;
}
