import { extractTrailingIndex, fileStem } from './category-matcher';

type OrderKey = {
  index: number | undefined;
  name: string;
};

function orderKey(filePath: string): OrderKey {
  const stem = fileStem(filePath);
  return { index: extractTrailingIndex(stem), name: stem.toLowerCase() };
}

function compareKeys(a: OrderKey, b: OrderKey): number {
  if (a.index !== undefined && b.index !== undefined) {
    if (a.index !== b.index) return a.index - b.index;
  } else if (a.index !== undefined) {
    return -1;
  } else if (b.index !== undefined) {
    return 1;
  }
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Orders a category's samples for velocity layering (first = softest).
 *
 * Files ending in " <n>" come first, by n ascending; the rest follow
 * alphabetically (case-insensitive). Returns a new array.
 */
export function sortSamplesByTrailingNumber(paths: readonly string[]): string[] {
  return paths
    .map((p) => ({ path: p, key: orderKey(p) }))
    .sort((a, b) => compareKeys(a.key, b.key))
    .map((entry) => entry.path);
}
