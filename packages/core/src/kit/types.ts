/**
 * category → sample paths for one kit. Categories keep first-seen order.
 */
export type KitElements = Map<string, string[]>;

/**
 * kit name → elements. Kits keep first-seen order.
 */
export type KitCollection = Map<string, KitElements>;

export type KitStats = {
  total: number;
  /** Every sample in the kit is uncategorized. */
  onlyOther: boolean;
  /** The kit has uncategorized samples alongside at least one real category. */
  mixedOther: boolean;
};
