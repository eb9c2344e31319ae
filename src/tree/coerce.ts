/**
 * Lenient conversions between stored scalars and the kinds serializers ask
 * for. Each returns undefined when the value cannot be converted.
 */

export type Scalar = string | number | boolean;

export function isScalar(value: unknown): value is Scalar {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

export function asString(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

export function asDouble(value: unknown): number | undefined {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

export function asFloat(value: unknown): number | undefined {
  const double = asDouble(value);
  return double === undefined ? undefined : Math.fround(double);
}

/** Truncates toward zero; values beyond the safe integer range lose precision */
export function asLong(value: unknown): number | undefined {
  const double = asDouble(value);
  if (double === undefined || !Number.isFinite(double)) {
    return undefined;
  }
  return Math.trunc(double);
}

/** Truncates toward zero, then wraps to 32 bits */
export function asInt(value: unknown): number | undefined {
  const long = asLong(value);
  return long === undefined ? undefined : long | 0;
}

export function toShort(value: number): number {
  return (value << 16) >> 16;
}

export function toByte(value: number): number {
  return (value << 24) >> 24;
}

const TRUE_STRINGS = new Set(["true", "t", "yes", "y", "1"]);
const FALSE_STRINGS = new Set(["false", "f", "no", "n", "0"]);

export function asBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value !== 0;
  }
  if (typeof value === "string") {
    const lower = value.toLowerCase();
    if (TRUE_STRINGS.has(lower)) return true;
    if (FALSE_STRINGS.has(lower)) return false;
  }
  return undefined;
}
