/** Merge identity for a country: its name, trimmed and case-folded. */
export function toNameKey(name: string): string {
  return name.trim().toLowerCase();
}
