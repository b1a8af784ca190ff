/** The value itself when it has content; null for null, undefined, empty or whitespace-only */
export function nonBlank(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return value.trim() === '' ? null : value;
}
