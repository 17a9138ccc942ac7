const MAX_STRING_LENGTH = 1000;
const MAX_LIST_LENGTH = 100;

const SENSITIVE_KEYS = ["password", "token", "secret", "apiKey", "databaseUrl"];

function sanitizeValue(value: unknown): unknown {
  if (typeof value === "string" && value.length > MAX_STRING_LENGTH) {
    return value.slice(0, MAX_STRING_LENGTH) + "...[truncated]";
  }
  if (Array.isArray(value)) {
    const items = value.slice(0, MAX_LIST_LENGTH).map(sanitizeValue);
    if (value.length > MAX_LIST_LENGTH) {
      items.push(`...[${value.length - MAX_LIST_LENGTH} more]`);
    }
    return items;
  }
  if (value !== null && typeof value === "object") {
    return sanitizeDetails(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

/**
 * Prepares processing-log details for storage: redacts credential-looking
 * keys, truncates long strings and caps long lists (row errors on a bad file).
 */
export function sanitizeDetails(details?: Record<string, unknown>): Record<string, unknown> | null {
  if (!details) return null;

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    if (SENSITIVE_KEYS.some((sk) => key.toLowerCase().includes(sk.toLowerCase()))) {
      sanitized[key] = "[REDACTED]";
    } else {
      sanitized[key] = sanitizeValue(value);
    }
  }

  return sanitized;
}
