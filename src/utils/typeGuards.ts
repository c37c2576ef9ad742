export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * First element of `value[key]` when that is an array, otherwise undefined.
 */
export function firstOf(value: Record<string, unknown>, key: string): unknown {
  const items = value[key];
  return Array.isArray(items) ? items[0] : undefined;
}
