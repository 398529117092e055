/**
 * Canonical JSON encoding for event payloads and API responses.
 * Keys are sorted alphabetically, no whitespace, no undefined values,
 * bigints written as decimal strings.
 */
export function canonicalEncode(obj: unknown): string {
  return JSON.stringify(obj, (_, value: unknown) => {
    if (typeof value === "bigint") {
      return value.toString();
    }
    if (isPlainRecord(value)) {
      return Object.keys(value)
        .sort()
        .reduce<Record<string, unknown>>((sorted, key) => {
          if (value[key] !== undefined) {
            sorted[key] = value[key];
          }
          return sorted;
        }, {});
    }
    return value;
  });
}

/**
 * Deep-copy `value` replacing every bigint with its decimal string, so the
 * result survives `JSON.stringify` and `res.json`.
 */
export function toWire(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return value.map(toWire);
  if (isPlainRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = toWire(inner);
    }
    return out;
  }
  return value;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return (
    value !== null &&
    typeof value === "object" &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}
