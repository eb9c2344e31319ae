export function safeStringify(
  value: unknown,
  space?: number,
  options?: { maxDepth?: number },
): string {
  const seen = new WeakSet<object>();
  const holderDepth = new WeakMap<object, number>();

  const maxDepth = options?.maxDepth ?? Infinity;

  const replacer = function (this: unknown, _key: string, val: unknown) {
    if (typeof val === "function") {
      return "function()";
    }

    if (typeof val === "bigint") {
      return val.toString();
    }

    if (val instanceof Map) {
      return Object.fromEntries(
        Array.from(val.entries(), ([key, entry]) => [String(key), entry]),
      );
    }

    // Depth of the current value is derived from its holder (this)
    const holderObject: object = Object(this);
    const parentDepth = holderDepth.get(holderObject) ?? 0;
    const currentDepth = parentDepth + 1;

    if (typeof val === "object" && val !== null) {
      if (seen.has(val)) return "[Circular]";

      if (currentDepth > maxDepth) {
        return Array.isArray(val) ? "[Array]" : "[Object]";
      }

      seen.add(val);
      holderDepth.set(val, currentDepth);
    }
    return val;
  };

  try {
    return JSON.stringify(value, replacer, space);
  } catch {
    try {
      return String(value);
    } catch {
      return "[Unserializable]";
    }
  }
}
