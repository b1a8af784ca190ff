/**
 * PII Sanitization
 *
 * Applied to every log line before it leaves the process. Order ids, courier
 * ids and amounts are not PII and pass through untouched.
 *
 * Categories:
 *   - Payment data (card numbers, CVV) → [PCI_REDACTED]
 *   - Credentials (Stripe keys, JWTs, passwords) → [CREDENTIAL_REDACTED]
 *   - Contact info (emails, phone numbers) → [EMAIL_REDACTED] / [PHONE_REDACTED]
 */

const PII_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // Payment data
  { pattern: /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g, replacement: '[PCI_REDACTED]' },
  { pattern: /\bcvc?v?\s*[:=]\s*\d{3,4}\b/gi, replacement: 'cvv=[PCI_REDACTED]' },

  // Credentials
  { pattern: /\b(?:sk|rk)_(?:test|live)_\w{10,}\b/g, replacement: '[CREDENTIAL_REDACTED]' },
  { pattern: /\bwhsec_\w{10,}\b/g, replacement: '[CREDENTIAL_REDACTED]' },
  { pattern: /\beyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\b/g, replacement: '[JWT_REDACTED]' },
  { pattern: /password\s*[:=]\s*['"]?[^\s'"]{3,}/gi, replacement: 'password=[CREDENTIAL_REDACTED]' },

  // Contact info
  { pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, replacement: '[EMAIL_REDACTED]' },
  { pattern: /(?:\+?1[\s.-]?)?\(?\b\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}\b/g, replacement: '[PHONE_REDACTED]' },
];

export function sanitizePII(input: string): string {
  let result = input;
  for (const { pattern, replacement } of PII_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

/** Keys whose values are dropped whatever they contain, with the label used */
const SENSITIVE_KEYS = new Map<string, string>([
  ['password', 'CREDENTIAL_REDACTED'],
  ['secret', 'CREDENTIAL_REDACTED'],
  ['token', 'CREDENTIAL_REDACTED'],
  ['api_key', 'CREDENTIAL_REDACTED'],
  ['apikey', 'CREDENTIAL_REDACTED'],
  ['authorization', 'CREDENTIAL_REDACTED'],
  ['service_role_key', 'CREDENTIAL_REDACTED'],
  ['card_number', 'PCI_REDACTED'],
  ['cvv', 'PCI_REDACTED'],
  ['payment_info', 'PCI_REDACTED'],
  ['phone_number', 'PII_MASKED'],
  ['email', 'PII_MASKED'],
]);

/**
 * Sanitize a value recursively, preserving its shape.
 */
export function sanitizeObject(obj: unknown, depth: number = 0): unknown {
  if (depth > 10) return '[MAX_DEPTH_REACHED]';
  if (obj === null || obj === undefined) return obj;
  if (typeof obj === 'string') return sanitizePII(obj);
  if (typeof obj === 'number' || typeof obj === 'boolean') return obj;

  if (obj instanceof Error) {
    return {
      name: obj.name,
      message: sanitizePII(obj.message),
      stack: obj.stack ? sanitizePII(obj.stack) : undefined,
    };
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => sanitizeObject(item, depth + 1));
  }

  if (typeof obj === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const label = SENSITIVE_KEYS.get(key.toLowerCase());
      sanitized[key] = label ? `[${label}]` : sanitizeObject(value, depth + 1);
    }
    return sanitized;
  }

  return String(obj);
}
