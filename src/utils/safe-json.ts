/**
 * JSON.stringify that never throws: circular references become "[Circular]",
 * bigints are stringified, and values JSON cannot represent fall back to String().
 * An object reached twice along separate branches is rendered both times.
 */
export function safeJson(value: unknown): string {
  // Objects on the path from the root to the value being replaced
  const ancestors: object[] = [];
  try {
    const json = JSON.stringify(value, function (this: unknown, _key: string, v: unknown) {
      if (typeof v === "bigint") return v.toString();
      if (typeof v !== "object" || v === null) return v;
      while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {
        ancestors.pop();
      }
      if (ancestors.includes(v)) return "[Circular]";
      ancestors.push(v);
      return v;
    });
    return json ?? String(value);
  } catch {
    // A throwing toJSON() or getter; fall back to the default conversion
    return Object.prototype.toString.call(value);
  }
}
