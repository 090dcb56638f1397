const SENSITIVE_KEYS = ['api_key', 'apikey', 'authorization', 'password', 'secret'];

// `max_tokens` and friends are counts, not credentials
function isSensitiveKey(key: string): boolean {
  const lowered = key.toLowerCase();
  return lowered === 'token'
    || lowered.endsWith('_token')
    || SENSITIVE_KEYS.some(sensitive => lowered.includes(sensitive));
}

/**
 * Copy of `data` with secret-looking keys masked, for debug logging of
 * request payloads and headers.
 */
export function sanitizeForLogging(data: unknown): unknown {
  if (Array.isArray(data)) {
    return data.map(item => sanitizeForLogging(item));
  }
  if (data && typeof data === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      sanitized[key] = isSensitiveKey(key)
        ? '***'
        : sanitizeForLogging(value);
    }
    return sanitized;
  }
  return data;
}
