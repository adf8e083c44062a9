export type NaturalSortKey = Array<string | number>;

/**
 * Split a title into alternating text/number runs. Whitespace is collapsed
 * first so "Module  2" and "Module 2" share a key. Even positions are always
 * text (possibly empty) and odd positions always numbers.
 */
export function naturalSortKey(value: string): NaturalSortKey {
  const normalized = value.split(/\s+/).filter(Boolean).join(' ');
  return normalized
    .split(/(\d+)/)
    .map((part, index) => (index % 2 === 1 ? parseInt(part, 10) : part.toLowerCase()));
}

function compareParts(a: string | number, b: string | number): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export function compareSortKeys(left: NaturalSortKey, right: NaturalSortKey): number {
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = compareParts(left[i], right[i]);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

export function compareNatural(a: string, b: string): number {
  return compareSortKeys(naturalSortKey(a), naturalSortKey(b));
}
