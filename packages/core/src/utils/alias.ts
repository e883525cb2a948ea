/**
 * Anything that can answer "is this alias taken?" (Set, Map, ...)
 */
export interface AliasLookup {
  has(alias: string): boolean;
}

/**
 * Linear probing over `base`, `base1`, `base2`, ... returning the first
 * alias not present in `existing`. Does not modify `existing`.
 *
 * @example
 * ```typescript
 * getUniqueAlias(new Set(['j', 'j1']), 'j'); // 'j2'
 * ```
 */
export function getUniqueAlias(existing: AliasLookup, base: string): string {
  if (!existing.has(base)) {
    return base;
  }

  let suffix = 1;
  while (existing.has(`${base}${suffix}`)) {
    suffix++;
  }
  return `${base}${suffix}`;
}
