/**
 * Masking helpers for log output. Session identifiers and credentials never
 * reach the logs in clear text.
 */

const SENSITIVE_PATTERNS = {
  apiKey: /(?:api[_-]?key|apikey|access[_-]?token|secret[_-]?key)\s*[:=]\s*['"]?([a-zA-Z0-9_\-]{20,})['"]?/gi,
  mongoUri: /mongodb(?:\+srv)?:\/\/[^\s"'<>]+/gi,
  email: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
};

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * Mask sensitive data in strings
 * @param maskChar - Character to use for masking (default: '*')
 */
export function maskSensitiveData(text: string, maskChar: string = '*'): string {
  if (!text) {
    return text;
  }

  let sanitized = text.replace(SENSITIVE_PATTERNS.apiKey, (match: string, key: string) =>
    match.replace(key, maskChar.repeat(key.length))
  );

  // Keep the protocol visible
  sanitized = sanitized.replace(SENSITIVE_PATTERNS.mongoUri, (uri: string) => {
    const protocolEnd = uri.indexOf('://') + 3;
    return uri.substring(0, protocolEnd) + maskChar.repeat(8);
  });

  sanitized = sanitized.replace(SENSITIVE_PATTERNS.email, (email: string) => {
    const [local, domain] = email.split('@');
    return `${local.charAt(0)}${maskChar.repeat(3)}@${domain}`;
  });

  return sanitized;
}

/** Shows only the first four characters of an identifier. */
export function maskIdentifier(id: string, maskChar: string = '*'): string {
  if (id.length <= 4) {
    return maskChar.repeat(id.length);
  }
  return id.substring(0, 4) + maskChar.repeat(Math.min(id.length - 4, 8));
}

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId);
}
