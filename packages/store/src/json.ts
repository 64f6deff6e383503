import { isRecord, toStringMap, type JsonObject } from '@alertline/core';

/**
 * Decode a JSON object column; corrupt or non-object content reads as `{}`
 */
export function readJsonObject(text: string | null): JsonObject {
  if (!text) return {};
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : {};
  } catch {
    return {};
  }
}

export function readStringMap(text: string | null): Record<string, string> {
  return toStringMap(readJsonObject(text));
}

export function readStringList(text: string | null): string[] {
  if (!text) return [];
  try {
    const value: unknown = JSON.parse(text);
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
  } catch {
    return [];
  }
}

export function toMillis(date: Date | null | undefined): number | null {
  return date ? date.getTime() : null;
}

export function fromMillis(value: number | null): Date | null {
  return value === null ? null : new Date(value);
}
