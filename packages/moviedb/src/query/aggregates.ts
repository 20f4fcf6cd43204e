/**
 * Aggregate Helpers
 *
 * The GROUP BY / GROUP_CONCAT / AVG / ROUND building blocks used by the
 * query engine. Groups keep first-appearance order so concatenated values
 * come out in group-membership order.
 */

/**
 * Separator used when concatenating the members of a group
 */
export const GROUP_SEPARATOR = ', ';

/**
 * Partition items by key, preserving the order in which keys first appear
 * and the order of items inside each group
 */
export function groupBy<T, K>(items: Iterable<T>, keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

/**
 * Concatenate values in order with the group separator
 */
export function groupConcat(values: readonly string[], separator: string = GROUP_SEPARATOR): string {
  return values.join(separator);
}

/**
 * Mean of integer values rounded half away from zero.
 *
 * Rounds the exact rational sum/count: [57, 57, 57, 58] gives 57.3.
 *
 * @returns `null` for an empty input
 */
export function roundedMean(values: readonly number[], decimals = 1): number | null {
  if (values.length === 0) {
    return null;
  }

  const sum = values.reduce((acc, value) => acc + value, 0);
  const scale = 10 ** decimals;
  const count = values.length;

  const scaled = Math.abs(sum) * scale;
  let quotient = Math.floor(scaled / count);
  const remainder = scaled - quotient * count;
  if (remainder * 2 >= count) {
    quotient++;
  }

  return (Math.sign(sum) * quotient) / scale;
}

/**
 * First year of the decade containing `year`; the division truncates toward
 * zero before multiplying back
 */
export function decadeOf(year: number): number {
  return Math.trunc(year / 10) * 10;
}

/**
 * Display label of a decade, e.g. 1990 -> "1990s"
 */
export function decadeLabel(decade: number): string {
  return `${decade}s`;
}

/**
 * First item with the greatest defined key; ties keep the earliest item.
 *
 * @returns `null` when no item has a key
 */
export function maxBy<T>(items: Iterable<T>, keyOf: (item: T) => number | null): T | null {
  let best: T | null = null;
  let bestKey = -Infinity;
  for (const item of items) {
    const key = keyOf(item);
    if (key !== null && (best === null || key > bestKey)) {
      best = item;
      bestKey = key;
    }
  }
  return best;
}
