// Masking for values that end up in log lines.

export const MASK_PLACEHOLDER = '***';

function toKeySet(keys: readonly string[]): Set<string> {
  return new Set(keys.map((key) => key.toLowerCase()));
}

/**
 * Shallow copy of `record` with every listed key (case-insensitive) replaced
 * by the placeholder. Keys whose value is empty are left as they are.
 */
export function maskSensitive<T extends Record<string, unknown>>(
  record: T,
  keys: readonly string[],
  placeholder: string = MASK_PLACEHOLDER,
): Record<string, unknown> {
  const masked = toKeySet(keys);
  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    const hidden = masked.has(key.toLowerCase()) && value !== undefined && value !== null && value !== '';
    copy[key] = hidden ? placeholder : value;
  }
  return copy;
}

/**
 * Deep variant for parsed response bodies. An empty key list returns the
 * value untouched.
 */
export function maskResponse(value: unknown, keys: readonly string[]): unknown {
  if (keys.length === 0) {
    return value;
  }
  return maskDeep(value, toKeySet(keys));
}

function maskDeep(value: unknown, masked: Set<string>): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => maskDeep(item, masked));
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    copy[key] = masked.has(key.toLowerCase()) ? MASK_PLACEHOLDER : maskDeep(entry, masked);
  }
  return copy;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
