import * as fs from 'fs';
import * as path from 'path';
import { ListingSchema, RejectedListingSchema } from '../contracts';
import { ListingFormatError } from '../errors';
import type { KitCollection, KitElements } from '../kit';
import type { RejectedKit } from '../filter';
import type { KitElementsJson, ListingJson, RejectedListingJson } from '../contracts';

/**
 * JSON import/export of kit listings.
 * Object key order follows the Map order on write; on read it follows the file
 * (except integer-like kit names, which JavaScript objects always list first).
 */

export function elementsToJson(elements: KitElements): KitElementsJson {
  return Object.fromEntries([...elements].map(([category, files]) => [category, [...files]]));
}

export function listingToJson(kits: KitCollection): ListingJson {
  return Object.fromEntries([...kits].map(([kitName, elements]) => [kitName, elementsToJson(elements)]));
}

export function listingFromJson(json: ListingJson): KitCollection {
  return new Map(
    Object.entries(json).map(([kitName, elements]) => [kitName, new Map(Object.entries(elements))])
  );
}

export function rejectedToJson(rejected: Map<string, RejectedKit>): RejectedListingJson {
  const out: RejectedListingJson = {};
  for (const [kitName, kit] of rejected) {
    out[kitName] = {
      reason: kit.reason,
      details: {
        overflow: kit.details.overflow,
        other_count: kit.details.otherCount,
        trash_needed: kit.details.trashNeeded,
        trash_capacity: kit.details.trashCapacity,
      },
      elements: elementsToJson(kit.elements),
    };
  }
  return RejectedListingSchema.parse(out);
}

/**
 * Parses listing JSON text. `source` names the input in error messages.
 */
export function parseListing(text: string, source = 'listing'): KitCollection {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ListingFormatError(source, err instanceof Error ? err.message : String(err));
  }

  const parsed = ListingSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ListingFormatError(source, parsed.error.message);
  }
  return listingFromJson(parsed.data);
}

export function readListing(filePath: string): KitCollection {
  return parseListing(fs.readFileSync(filePath, 'utf-8'), filePath);
}

function writeJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

export function writeListing(filePath: string, kits: KitCollection): void {
  writeJson(filePath, listingToJson(kits));
}

export function writeRejectedListing(filePath: string, rejected: Map<string, RejectedKit>): void {
  writeJson(filePath, rejectedToJson(rejected));
}
