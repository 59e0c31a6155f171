type CanonicalValue = null | boolean | number | string | CanonicalValue[] | CanonicalObject;
interface CanonicalObject {
  [key: string]: CanonicalValue;
}

function canonicalize(value: unknown): CanonicalValue | undefined {
  if (value === null) return null;
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "bigint":
      return value.toString();
    case "undefined":
    case "symbol":
    case "function":
      return undefined;
    default:
      break;
  }
  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item) ?? null);
  }
  if (typeof value === "object") {
    const output: CanonicalObject = {};
    for (const key of Object.keys(value).sort()) {
      const normalized = canonicalize(Reflect.get(value, key));
      if (normalized !== undefined) output[key] = normalized;
    }
    return output;
  }
  return String(value);
}

/**
 * JSON text with sorted keys and undefined members dropped, so that equal
 * option objects stringify identically.
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value) ?? null);
}
