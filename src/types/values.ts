export type Value = null | boolean | number | string | Value[] | { [key: string]: Value };

export type ValueObject = { [key: string]: Value };

export function isValueObject(v: Value | undefined): v is ValueObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Structural equality over JSON values; object key order is ignored. */
export function valueEquals(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((x, i) => valueEquals(x, b[i]));
  }
  if (isValueObject(a)) {
    if (!isValueObject(b)) return false;
    const ka = Object.keys(a);
    if (ka.length !== Object.keys(b).length) return false;
    return ka.every(k => k in b && valueEquals(a[k], b[k]));
  }
  return false;
}

/** Deep copy handed to each fork branch so siblings never share mutable input. */
export function cloneValue<T extends Value>(v: T): T {
  return structuredClone(v);
}

/** Adds an own key, including one named `__proto__`. */
export function setEntry(target: ValueObject, key: string, value: Value): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Coerce arbitrary JS data (parsed JSON/YAML, handler results) into a Value. */
export function toValue(raw: unknown): Value {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === "string" || typeof raw === "boolean") return raw;
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;
  if (typeof raw === "bigint") return Number(raw);
  if (raw instanceof Date) return raw.toISOString();
  if (Array.isArray(raw)) return raw.map(toValue);
  if (typeof raw === "object") {
    const out: ValueObject = {};
    for (const [k, v] of Object.entries(raw)) {
      if (v !== undefined) setEntry(out, k, toValue(v));
    }
    return out;
  }
  return String(raw);
}
