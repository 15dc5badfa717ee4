/**
 * Typed readers for DynamoDB document items
 */

export type Item = Record<string, unknown>;

export function readString(item: Item, key: string, fallback = ''): string {
  const value = item[key];
  return typeof value === 'string' ? value : fallback;
}

export function readOptionalString(item: Item, key: string): string | undefined {
  const value = item[key];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(item: Item, key: string, fallback = 0): number {
  const value = item[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function readOptionalNumber(item: Item, key: string): number | undefined {
  const value = item[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readBoolean(item: Item, key: string, fallback = false): boolean {
  const value = item[key];
  return typeof value === 'boolean' ? value : fallback;
}

export function readRecord(item: Item, key: string): Item | undefined {
  const value = item[key];
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}
