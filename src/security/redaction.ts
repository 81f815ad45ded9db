/**
 * @fileoverview Secret redaction for logs, diagnostics and error messages
 *
 * Two layers:
 * - pattern redaction for secret shapes that can show up in tool output
 *   (PEM private keys, bearer headers, token query parameters, URL userinfo)
 * - literal redaction for values registered at runtime with `registerSecret`
 *   (the auth token and the provisioned key text)
 */

export type RedactionType = 'private_key' | 'bearer' | 'query_token' | 'url_credentials' | 'secret';

export interface RedactionCounts { total: number; by_type: Record<RedactionType, number>; }
export interface RedactionResult { text: string; counts: RedactionCounts; }

// Every pattern has exactly one capture group: the prefix kept in front of the marker.
const REDACTION_PATTERNS: Array<{ type: RedactionType; regex: RegExp; keepPrefix: boolean }> = [
  { type: 'private_key', regex: /(-----BEGIN [A-Z ]*PRIVATE KEY-----)[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g, keepPrefix: false },
  { type: 'bearer', regex: /(authorization:\s*bearer\s+)[^\s'"]+/gi, keepPrefix: true },
  { type: 'query_token', regex: /([?&](?:access_)?token=)[^&\s'"#]+/gi, keepPrefix: true },
  { type: 'url_credentials', regex: /([a-z][a-z0-9+.-]*:\/\/)[^\s/@:]+:[^\s/@]+@/gi, keepPrefix: true },
];

const MIN_SECRET_LENGTH = 4;
const registeredSecrets = new Set<string>();

const createEmptyRedactionCounts = (): RedactionCounts => ({
  total: 0,
  by_type: { private_key: 0, bearer: 0, query_token: 0, url_credentials: 0, secret: 0 },
});

/**
 * Register a literal secret so every later redaction masks it.
 * Values shorter than four characters are ignored.
 */
export function registerSecret(value: string): void {
  const trimmed = value.trim();
  if (trimmed.length < MIN_SECRET_LENGTH) return;
  registeredSecrets.add(trimmed);
}

export function clearRegisteredSecrets(): void {
  registeredSecrets.clear();
}

export function registeredSecretCount(): number {
  return registeredSecrets.size;
}

export function redactText(text: string): RedactionResult {
  let redacted = text;
  const counts = createEmptyRedactionCounts();
  for (const pattern of REDACTION_PATTERNS) {
    redacted = redacted.replace(pattern.regex, (_match: string, prefix: string) => {
      counts.by_type[pattern.type] += 1;
      counts.total += 1;
      return `${pattern.keepPrefix ? prefix : ''}[REDACTED:${pattern.type}]`;
    });
  }
  // Longest first so a secret containing another registered secret is masked whole.
  const literals = [...registeredSecrets].sort((a, b) => b.length - a.length);
  for (const secret of literals) {
    const parts = redacted.split(secret);
    if (parts.length > 1) {
      counts.by_type.secret += parts.length - 1;
      counts.total += parts.length - 1;
      redacted = parts.join('[REDACTED:secret]');
    }
  }
  return { text: redacted, counts };
}

/**
 * Redact every string inside a log context, descending into arrays and plain objects.
 */
export function redactContext(context: Record<string, unknown>): Record<string, unknown> {
  return redactEntries(context);
}

function redactEntries(source: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    result[key] = redactValue(value);
  }
  return result;
}

function redactValue(value: unknown): unknown {
  if (typeof value === 'string') return redactText(value).text;
  if (Array.isArray(value)) return value.map(redactValue);
  if (value instanceof Error) return redactText(value.message).text;
  if (value && typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) {
    return redactEntries(value);
  }
  return value;
}

/**
 * Describe an endpoint for humans without its query string or userinfo.
 */
export function endpointLabel(endpoint: string): string {
  try {
    const url = new URL(endpoint);
    return `${url.origin}${url.pathname}`;
  } catch {
    return '<invalid endpoint>';
  }
}
