/**
 * Utility functions for working with records
 */

/**
 * Field names are matched case-insensitively; this is the canonical key
 */
export function normalizeFieldName(name: string): string {
  return name.toLowerCase();
}

/**
 * Find names that collide once normalized, e.g. "Id" and "ID"
 */
export function findDuplicateFieldNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    const normalized = normalizeFieldName(name);
    if (seen.has(normalized)) {
      duplicates.add(normalized);
    }
    seen.add(normalized);
  }
  return Array.from(duplicates);
}
