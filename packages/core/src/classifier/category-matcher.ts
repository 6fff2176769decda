import * as path from 'path';
import { OTHER_CATEGORY, UNKNOWN_KIT_NAME } from '../config/constants';
import { escapeRegExp } from '../mapping';
import type { Nomenclature } from '../mapping';

/**
 * Filename → category matching and kit-name derivation.
 * Used by the crawler to group scanned samples into kits.
 */

/**
 * Returns the canonical category of the first nomenclature entry with a synonym
 * that appears as a whole word in the filename, or "other" when none does.
 * Declaration order decides ties: "Kick Snare.wav" goes to whichever was declared first.
 */
export function detectCategory(filename: string, nomenclature: Nomenclature): string {
  const name = filename.toLowerCase();
  for (const entry of nomenclature) {
    if (entry.patterns.some((pattern) => pattern.test(name))) {
      return entry.canonical;
    }
  }
  return OTHER_CATEGORY;
}

/**
 * Derives the kit a sample belongs to from its filename:
 * "Kick 808 1.wav" in category "kick" → "808".
 */
export function extractKitName(filename: string, category: string): string {
  let stem = fileStem(filename);
  stem = stem.replace(new RegExp(`^${escapeRegExp(category)}\\s*`, 'i'), '');
  stem = stem.replace(/\s*\d+$/, '');
  return stem.trim() || UNKNOWN_KIT_NAME;
}

/**
 * The numeric suffix of "Snare 12" (12), or undefined when the stem has none.
 * The digits must follow whitespace: "Snare12" has no index.
 */
export function extractTrailingIndex(stem: string): number | undefined {
  const match = /\s(\d+)$/.exec(stem);
  return match ? Number(match[1]) : undefined;
}

/**
 * Base name without its last extension.
 */
export function fileStem(filePath: string): string {
  return path.parse(filePath).name;
}
