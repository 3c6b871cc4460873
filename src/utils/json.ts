/**
 * Narrowing helpers for parsed JSON and YAML
 */

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stringField(obj: Record<string, unknown>, key: string, fallback: string = ""): string {
  const value = obj[key];
  return typeof value === "string" ? value : fallback;
}

/**
 * Flatten a JSON object of string values (e.g. container labels), dropping the rest
 */
export function stringRecord(value: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (!isPlainObject(value)) {
    return record;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      record[key] = entry;
    }
  }
  return record;
}
