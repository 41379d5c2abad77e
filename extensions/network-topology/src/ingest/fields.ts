/**
 * Network Topology — Field Access Helpers
 *
 * Field path resolution over the loosely typed records produced by the
 * provider's describe/list APIs, with the defaulting rules the normalizer
 * applies (missing string → "", missing number → 0, missing flag → false).
 */

/** One provider record as loaded from an export file. */
export type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Field Path Resolution
// =============================================================================

/**
 * Resolve a dot-separated field path with array notation from a raw object.
 * Returns raw (uncoerced) values.
 *
 * Supports:
 *   "VpcId"                               → [value]
 *   "Options.AmazonSideAsn"               → [value]
 *   "CidrBlockAssociationSet[].CidrBlock" → [value, value]
 *   "Tags[Name]"                          → [value]  (Key/Value or key/value pairs)
 */
export function resolveFieldPathRaw(obj: unknown, path: string): unknown[] {
  if (!isRecord(obj)) return [];

  let current: unknown[] = [obj];

  for (const part of path.split(".")) {
    const next: unknown[] = [];
    const arrayMatch = part.match(/^(.+?)\[(.*)\]$/);

    if (arrayMatch) {
      const key = arrayMatch[1] ?? "";
      const tagKey = arrayMatch[2] ?? "";

      for (const item of current) {
        if (!isRecord(item)) continue;
        const value = item[key];
        if (!Array.isArray(value)) continue;

        if (tagKey === "") {
          next.push(...value);
          continue;
        }

        for (const entry of value) {
          if (!isRecord(entry)) continue;
          if (entry.Key === tagKey && entry.Value != null) next.push(entry.Value);
          else if (entry.key === tagKey && entry.value != null) next.push(entry.value);
        }
      }
    } else {
      for (const item of current) {
        if (!isRecord(item)) continue;
        const value = item[part];
        if (value !== undefined && value !== null) next.push(value);
      }
    }

    current = next;
    if (current.length === 0) break;
  }

  return current;
}

// =============================================================================
// Typed Accessors
// =============================================================================

/** First string (or number rendered as string) at `path`, else `fallback`. */
export function fieldString(obj: unknown, path: string, fallback = ""): string {
  for (const value of resolveFieldPathRaw(obj, path)) {
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
    if (value instanceof Date) return value.toISOString();
  }
  return fallback;
}

/** Like `fieldString`, but empty or missing values become null. */
export function optionalString(obj: unknown, path: string): string | null {
  const value = fieldString(obj, path);
  return value === "" ? null : value;
}

export function fieldNumber(obj: unknown, path: string, fallback = 0): number {
  for (const value of resolveFieldPathRaw(obj, path)) {
    if (typeof value === "number" && Number.isFinite(value)) return value;
    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) return parsed;
    }
  }
  return fallback;
}

export function fieldBoolean(obj: unknown, path: string, fallback = false): boolean {
  for (const value of resolveFieldPathRaw(obj, path)) {
    if (typeof value === "boolean") return value;
  }
  return fallback;
}

/** All non-empty strings at `path`. */
export function fieldStrings(obj: unknown, path: string): string[] {
  return resolveFieldPathRaw(obj, path).filter(
    (v): v is string => typeof v === "string" && v !== "",
  );
}

/** All object elements at `path` (used for nested lists such as Associations[]). */
export function fieldRecords(obj: unknown, path: string): RawRecord[] {
  return resolveFieldPathRaw(obj, path).filter(isRecord);
}

/** Value of the `Name` tag, or "" when the record carries none. */
export function nameTag(obj: unknown, tagsField = "Tags"): string {
  return fieldString(obj, `${tagsField}[Name]`);
}
