export function safeStringify(value: unknown): string {
  if (typeof value === "bigint") return `${value.toString()}n`;
  if (value === undefined) return "undefined";
  if (typeof value === "number" && !Number.isFinite(value)) return String(value);
  if (typeof value === "symbol" || typeof value === "function") return String(value);
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  if (value instanceof RegExp) return String(value);
  if (value instanceof Map) return `Map(${safeStringify(Array.from(value.entries()))})`;
  if (value instanceof Set) return `Set(${safeStringify(Array.from(value.values()))})`;
  try {
    const s = JSON.stringify(
      value,
      (_k, v) => (typeof v === "bigint" ? `${v.toString()}n` : v),
    );
    return s ?? String(value);
  } catch {
    return String(value);
  }
}

/** `safeStringify`, cut to `maxLength` characters. */
export function formatValue(value: unknown, maxLength: number): string {
  const s = safeStringify(value);
  return s.length > maxLength ? `${s.slice(0, maxLength)}…` : s;
}
