import { sortBy } from 'remeda';

export type Weighted = { readonly weight?: number | undefined };

/**
 * Sorts items in place by weight, highest first. Items without weight rank
 * like a weight of 1. When weights are equal, the item that comes later in
 * the array is moved first.
 *
 * @returns The same (now sorted) array.
 */
export function sortByWeight<T extends Weighted>(items: T[]): T[] {
  let sorted = sortBy(
    items.map((item, index) => ({ item, index })),
    [({ item }) => item.weight ?? 1, 'desc'],
    [({ index }) => index, 'desc'],
  );
  items.splice(0, items.length, ...sorted.map(({ item }) => item));
  return items;
}
