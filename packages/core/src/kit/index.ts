import { OTHER_CATEGORY } from '../config/constants';
import type { KitCollection, KitElements, KitStats } from './types';

export type { KitCollection, KitElements, KitStats } from './types';

export function kitStats(elements: KitElements): KitStats {
  let total = 0;
  for (const files of elements.values()) {
    total += files.length;
  }
  const hasOther = elements.has(OTHER_CATEGORY);
  return {
    total,
    onlyOther: hasOther && elements.size === 1,
    mixedOther: hasOther && elements.size > 1,
  };
}

/**
 * Appends a sample to a kit collection, creating the kit and category on first sight.
 */
export function addSample(kits: KitCollection, kitName: string, category: string, filePath: string): void {
  let elements = kits.get(kitName);
  if (!elements) {
    elements = new Map();
    kits.set(kitName, elements);
  }
  const files = elements.get(category);
  if (files) {
    files.push(filePath);
  } else {
    elements.set(category, [filePath]);
  }
}
