/**
 * One instrument category from a mapping definition.
 */
export type CategoryDefinition = {
  /**
   * Category key, always the first synonym (e.g. "kick").
   */
  canonical: string;

  /**
   * Lower-cased synonyms in declaration order; the canonical name comes first.
   */
  synonyms: string[];

  /**
   * MIDI notes reserved for this category, in declaration order.
   * Undefined means the line declared no notes (unbounded capacity);
   * an empty array means it declared an empty list (capacity 0).
   */
  midiNotes?: number[];
};

/**
 * Categories keyed by canonical name, in declaration order.
 */
export type MappingTable = Map<string, CategoryDefinition>;

/**
 * Classifier view of a mapping: an ordered list so that the first declared
 * category that matches a filename wins.
 */
export type NomenclatureEntry = {
  canonical: string;
  synonyms: string[];
  patterns: RegExp[];
};

export type Nomenclature = NomenclatureEntry[];
