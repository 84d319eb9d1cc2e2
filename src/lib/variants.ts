/**
 * Case-folded set of strings that denote the United Kingdom as a country value.
 */
export type UkVariantSet = ReadonlySet<string>;

// JavaScript has no casefold; lower-casing matches it for every spelling in practice
export function caseFold(value: string): string {
  return value.toLowerCase();
}

/**
 * Build the variant set from already-trimmed, non-blank lines. Entries that
 * differ only in case collapse to one; nothing else is normalised.
 */
export function buildUkVariantSet(variants: Iterable<string>): UkVariantSet {
  const set = new Set<string>();
  for (const variant of variants) {
    set.add(caseFold(variant));
  }
  return set;
}

export function isUkVariant(value: string, ukVariants: UkVariantSet): boolean {
  return ukVariants.has(caseFold(value.trim()));
}
