import { LAYER_LIMIT_PER_PAD, OTHER_CATEGORY } from '../config/constants';
import { sortSamplesByTrailingNumber } from '../classifier';
import { categoryCapacity } from '../mapping';
import { kitStats } from '../kit';
import type { MappingTable } from '../mapping';
import type { KitCollection, KitElements } from '../kit';
import type {
  CategoryOverflow,
  FilterOptions,
  FilterResult,
  KitVerdict,
  RejectedKit,
  RejectionDetails,
  RejectionReason,
} from './types';

export const DEFAULT_FILTER_OPTIONS: FilterOptions = {
  minTotalSamples: 0,
  excludeOnlyOther: false,
  excludeMixedOther: false,
  overflowPolicy: 'reject',
  trashNotes: [],
};

/**
 * Real categories holding more samples than their notes can take.
 * Categories without a declared note list are never reported.
 */
export function findOverflow(elements: KitElements, mapping: MappingTable): CategoryOverflow[] {
  const overflow: CategoryOverflow[] = [];
  for (const [category, files] of elements) {
    if (category === OTHER_CATEGORY) continue;

    const capacity = categoryCapacity(mapping, category);
    if (capacity !== undefined && files.length > capacity) {
      overflow.push({ category, count: files.length, capacity });
    }
  }
  return overflow;
}

/**
 * Decides whether one kit becomes a preset.
 *
 * Threshold checks run first, in order (too few samples, only other,
 * mixed other); the overflow policy can only add a reason when none of
 * those fired. Details describe the overflow either way.
 */
export function evaluateKit(
  kitName: string,
  elements: KitElements,
  mapping: MappingTable,
  options: FilterOptions
): KitVerdict {
  const stats = kitStats(elements);

  let reason: RejectionReason | undefined;
  const details: RejectionDetails = {};

  if (stats.total < options.minTotalSamples) {
    reason = 'too_few_samples';
  } else if (options.excludeOnlyOther && stats.onlyOther) {
    reason = 'only_other';
  } else if (options.excludeMixedOther && stats.mixedOther) {
    reason = 'mixed_other';
  }

  const overflow = findOverflow(elements, mapping);
  const otherCount = elements.get(OTHER_CATEGORY)?.length ?? 0;

  if (overflow.length > 0 || otherCount > 0) {
    const trashNeeded = overflow.reduce((sum, o) => sum + (o.count - o.capacity), 0) + otherCount;

    if (options.overflowPolicy === 'reject') {
      reason ??= 'overflow_or_other';
    } else if (options.overflowPolicy === 'trash') {
      const trashCapacity = options.trashNotes.length * LAYER_LIMIT_PER_PAD;
      if (trashNeeded > trashCapacity) {
        reason ??= 'trash_zone_insufficient';
        details.trashNeeded = trashNeeded;
        details.trashCapacity = trashCapacity;
      }
    }

    details.overflow = overflow;
    details.otherCount = otherCount;
  }

  if (reason) {
    return { status: 'rejected', kitName, reason, details, elements };
  }

  const sorted: KitElements = new Map(
    [...elements].map(([category, files]) => [category, sortSamplesByTrailingNumber(files)])
  );
  return { status: 'accepted', kitName, elements: sorted };
}

/**
 * Splits kits into accepted (sorted, ready for assignment) and rejected
 * (with reason and details). Both keep the input's kit order.
 */
export function filterKits(
  kits: KitCollection,
  mapping: MappingTable,
  options: Partial<FilterOptions> = {}
): FilterResult {
  const resolved: FilterOptions = { ...DEFAULT_FILTER_OPTIONS, ...options };
  const valid: KitCollection = new Map();
  const rejected = new Map<string, RejectedKit>();

  for (const [kitName, elements] of kits) {
    const verdict = evaluateKit(kitName, elements, mapping, resolved);
    if (verdict.status === 'accepted') {
      valid.set(kitName, verdict.elements);
    } else {
      rejected.set(kitName, verdict);
    }
  }

  return { valid, rejected };
}
