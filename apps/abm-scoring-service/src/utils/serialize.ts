/**
 * Make a value JSON-safe. Values JSON cannot represent are replaced by their
 * string form and their paths appended to `degraded`.
 */
export function toSerializable(value: unknown, degraded: string[], path = "", ancestors: object[] = []): unknown {
  const here = path || "(root)";

  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (Number.isFinite(value)) return value;
      degraded.push(here);
      return String(value);
    case "bigint":
    case "symbol":
    case "function":
      degraded.push(here);
      return String(value);
    case "undefined":
      return undefined;
  }

  if (value === null) return null;
  if (typeof value !== "object") return String(value);

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      degraded.push(here);
      return String(value);
    }
    return value.toISOString();
  }

  if (ancestors.includes(value)) {
    degraded.push(here);
    return "[Circular]";
  }

  const nested = [...ancestors, value];
  const child = (key: string | number) => (path ? `${path}.${key}` : String(key));

  if (Array.isArray(value)) {
    return value.map((item, i) => toSerializable(item, degraded, child(i), nested));
  }

  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    const converted = toSerializable(item, degraded, child(key), nested);
    if (converted !== undefined) out[key] = converted;
  }
  return out;
}
