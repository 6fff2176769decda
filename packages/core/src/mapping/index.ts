import * as fs from 'fs';
import { MappingParseError, NoteSpecParseError } from '../errors';
import { LAYER_LIMIT_PER_PAD } from '../config/constants';
import { expandNoteList } from './midi-notes';
import type { CategoryDefinition, MappingTable, Nomenclature } from './types';

export type { CategoryDefinition, MappingTable, Nomenclature, NomenclatureEntry } from './types';

/**
 * Parses a mapping definition.
 *
 * Each non-blank line not starting with "#" is `syn[/syn...]` or
 * `syn[/syn...]:notes`. The first synonym becomes the canonical name;
 * a later line with the same canonical name replaces the earlier one.
 */
export function parseMapping(text: string): MappingTable {
  const mapping: MappingTable = new Map();
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, i) => {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith('#')) return;

    const lineNumber = i + 1;
    const colon = line.indexOf(':');
    const left = (colon === -1 ? line : line.slice(0, colon)).trim().toLowerCase();
    const right = colon === -1 ? undefined : line.slice(colon + 1).trim();

    const synonyms = left
      .split('/')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    if (synonyms.length === 0) {
      throw new MappingParseError(lineNumber, line, 'no category name before ":"');
    }

    let midiNotes: number[] | undefined;
    if (right !== undefined) {
      try {
        midiNotes = expandNoteList(right);
      } catch (err) {
        throw new MappingParseError(lineNumber, line, err instanceof Error ? err.message : String(err));
      }
    }

    const canonical = synonyms[0];
    // Map.set on an existing key keeps the first declaration's position
    mapping.set(canonical, { canonical, synonyms, midiNotes });
  });

  return mapping;
}

/**
 * Reads and parses a UTF-8 mapping file.
 */
export function loadMappingFile(filePath: string): MappingTable {
  return parseMapping(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Builds the classifier's ordered view of a mapping.
 */
export function toNomenclature(mapping: MappingTable): Nomenclature {
  return [...mapping.values()].map((entry) => ({
    canonical: entry.canonical,
    synonyms: [...entry.synonyms],
    patterns: entry.synonyms.map((word) => wholeWordPattern(word)),
  }));
}

/**
 * Number of samples a category can hold, or undefined when it declared no notes
 * (or is not in the mapping at all). Undefined capacity is never checked.
 */
export function categoryCapacity(mapping: MappingTable, category: string): number | undefined {
  const entry: CategoryDefinition | undefined = mapping.get(category);
  if (!entry || entry.midiNotes === undefined) {
    return undefined;
  }
  return entry.midiNotes.length * LAYER_LIMIT_PER_PAD;
}

/**
 * Every MIDI note reserved by some category.
 */
export function reservedNotes(mapping: MappingTable): Set<number> {
  const notes = new Set<number>();
  for (const entry of mapping.values()) {
    for (const note of entry.midiNotes ?? []) {
      notes.add(note);
    }
  }
  return notes;
}

/**
 * Parses a note list given on the command line ("82-127", "36,38,40-42").
 * The result is sorted ascending with duplicates removed.
 */
export function parseMidiNoteList(spec: string): number[] {
  try {
    return expandNoteList(spec).sort((a, b) => a - b);
  } catch (err) {
    throw new NoteSpecParseError(spec, err instanceof Error ? err.message : String(err));
  }
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Any Unicode letter, digit or underscore counts as part of a word
function wholeWordPattern(word: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(word)}(?![\\p{L}\\p{N}_])`, 'u');
}
