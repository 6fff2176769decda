import { filterKits } from '../filter';
import { scanSamples } from '../indexer/sample-crawler';
import { toNomenclature } from '../mapping';
import type { FilterOptions, FilterResult } from '../filter';
import type { MappingTable } from '../mapping';

export type CreateListingResult = FilterResult & {
  samplesFound: number;
  errors: string[];
};

/**
 * Scans a sample folder, groups files into kits and filters them.
 */
export function createListing(
  samplesRoot: string,
  mapping: MappingTable,
  options: Partial<FilterOptions> = {}
): CreateListingResult {
  const scan = scanSamples(samplesRoot, toNomenclature(mapping));
  const { valid, rejected } = filterKits(scan.kits, mapping, options);

  return {
    valid,
    rejected,
    samplesFound: scan.samplesFound,
    errors: scan.errors,
  };
}
