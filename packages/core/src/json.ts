/**
 * Helpers for reading fields out of arbitrary JSON payloads.
 *
 * Webhook bodies are untyped; drivers read them through these accessors so
 * that a missing or mistyped field turns into a default instead of a throw.
 */

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonObject {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Scalar to string; anything else yields the fallback
 */
export function asString(value: unknown, fallback = ''): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return fallback;
}

/**
 * First non-empty string among the given keys
 */
export function firstString(obj: JsonObject, keys: readonly string[], fallback = ''): string {
  for (const key of keys) {
    const value = asString(obj[key]);
    if (value !== '') return value;
  }
  return fallback;
}

export function hasKey(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

export function countKeys(obj: JsonObject, keys: readonly string[]): number {
  return keys.filter((key) => hasKey(obj, key)).length;
}

/**
 * Flatten a record into a string→string map.
 *
 * Nested values are JSON encoded; null and undefined entries are dropped.
 */
export function toStringMap(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(asRecord(value))) {
    if (entry === null || entry === undefined) continue;
    result[key] = typeof entry === 'object' ? JSON.stringify(entry) : asString(entry);
  }
  return result;
}

/**
 * Read a dot-separated path ("checks.0.status") from nested objects and arrays
 */
export function getPath(source: unknown, path: string): unknown {
  if (path === '') return source;
  let current: unknown = source;
  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index)) return undefined;
      current = current[index];
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Split "key:value" tags into a label map
 *
 * @param bareKey - Label name for tags without a colon
 */
export function parseTags(
  tags: unknown,
  bareKey: (tag: string) => string = (tag) => tag,
): Record<string, string> {
  const list = typeof tags === 'string' ? tags.split(',') : asArray(tags);
  const labels: Record<string, string> = {};
  for (const raw of list) {
    if (typeof raw !== 'string') continue;
    const tag = raw.trim();
    if (tag === '') continue;
    const colon = tag.indexOf(':');
    if (colon >= 0) {
      labels[tag.slice(0, colon)] = tag.slice(colon + 1);
    } else {
      labels[bareKey(tag)] = 'true';
    }
  }
  return labels;
}
