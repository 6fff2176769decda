import type { KitCollection, KitElements } from '../kit';

export const OVERFLOW_POLICIES = ['reject', 'truncate', 'trash', 'ignore'] as const;

/**
 * What happens to samples a category cannot hold (and to uncategorized ones):
 * - reject: the whole kit is rejected
 * - truncate: extra samples are dropped with a warning
 * - trash: extras go to the trash notes; the kit is rejected if they cannot fit
 * - ignore: extras go to the trash notes as far as they fit, never rejected
 */
export type OverflowPolicy = (typeof OVERFLOW_POLICIES)[number];

export type RejectionReason =
  | 'too_few_samples'
  | 'only_other'
  | 'mixed_other'
  | 'overflow_or_other'
  | 'trash_zone_insufficient';

export type CategoryOverflow = {
  category: string;
  count: number;
  capacity: number;
};

export type RejectionDetails = {
  overflow?: CategoryOverflow[];
  otherCount?: number;
  trashNeeded?: number;
  trashCapacity?: number;
};

export type FilterOptions = {
  minTotalSamples: number;
  excludeOnlyOther: boolean;
  excludeMixedOther: boolean;
  overflowPolicy: OverflowPolicy;
  /** Notes available to absorb overflow under the "trash" policy. */
  trashNotes: number[];
};

export type AcceptedKit = {
  status: 'accepted';
  kitName: string;
  /** Elements with every category sorted for layering. */
  elements: KitElements;
};

export type RejectedKit = {
  status: 'rejected';
  kitName: string;
  reason: RejectionReason;
  details: RejectionDetails;
  /** Elements as scanned, unsorted. */
  elements: KitElements;
};

export type KitVerdict = AcceptedKit | RejectedKit;

export type FilterResult = {
  valid: KitCollection;
  rejected: Map<string, RejectedKit>;
};
