/**
 * Canonical storage key for a cocktail name:
 * "Old Fashioned", "old-fashioned" and "OLD_FASHIONED" all become "old_fashioned".
 */
export function normalizeCocktailKey(name: string): string {
  return name.toLowerCase().replace(/[ -]/g, "_");
}
