import { describe, it, expect } from 'vitest';
import {
  categoryCapacity,
  parseMapping,
  parseMidiNoteList,
  reservedNotes,
  toNomenclature,
} from '../index';
import { MappingParseError, NoteSpecParseError } from '../../errors';

const MAPPING = [
  '# drums',
  'kick/bd/Bass Drum:36',
  '',
  'snare/sd:38,40',
  'hat/hh/hi-hat:42-44,42',
  'perc',
  'crash:',
].join('\n');

describe('parseMapping', () => {
  it('reads canonical names, lower-cased synonyms and note lists', () => {
    const mapping = parseMapping(MAPPING);

    expect([...mapping.keys()]).toEqual(['kick', 'snare', 'hat', 'perc', 'crash']);
    expect(mapping.get('kick')).toEqual({
      canonical: 'kick',
      synonyms: ['kick', 'bd', 'bass drum'],
      midiNotes: [36],
    });
    expect(mapping.get('snare')?.midiNotes).toEqual([38, 40]);
  });

  it('expands ranges in declaration order and drops repeats', () => {
    expect(parseMapping(MAPPING).get('hat')?.midiNotes).toEqual([42, 43, 44]);
    expect(parseMapping('tom:47,45-46').get('tom')?.midiNotes).toEqual([47, 45, 46]);
  });

  it('distinguishes "no notes" from an empty note list', () => {
    const mapping = parseMapping(MAPPING);
    expect(mapping.get('perc')?.midiNotes).toBeUndefined();
    expect(mapping.get('crash')?.midiNotes).toEqual([]);
  });

  it('lets a later line replace an earlier one in its original position', () => {
    const mapping = parseMapping('kick:36\nsnare:38\nkick/bd:35');
    expect([...mapping.keys()]).toEqual(['kick', 'snare']);
    expect(mapping.get('kick')).toEqual({ canonical: 'kick', synonyms: ['kick', 'bd'], midiNotes: [35] });
  });

  it('accepts CRLF line endings', () => {
    expect([...parseMapping('kick:36\r\nsnare:38\r\n').keys()]).toEqual(['kick', 'snare']);
  });

  it.each([
    ['kick:36,x', 1],
    ['kick:36\ntom:50-45', 2],
    ['tom:200', 1],
    ['\n:36', 2],
  ])('rejects %j with a line number', (text, lineNumber) => {
    let caught: unknown;
    try {
      parseMapping(text);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MappingParseError);
    if (caught instanceof MappingParseError) {
      expect(caught.lineNumber).toBe(lineNumber);
      expect(caught.code).toBe('MAPPING_PARSE');
    }
  });
});

describe('toNomenclature', () => {
  it('keeps declaration order and synonyms exactly as declared', () => {
    const nomenclature = toNomenclature(parseMapping(MAPPING));
    expect(nomenclature.map((e) => [e.canonical, e.synonyms])).toEqual([
      ['kick', ['kick', 'bd', 'bass drum']],
      ['snare', ['snare', 'sd']],
      ['hat', ['hat', 'hh', 'hi-hat']],
      ['perc', ['perc']],
      ['crash', ['crash']],
    ]);
    expect(nomenclature[0].patterns).toHaveLength(3);
  });
});

describe('categoryCapacity', () => {
  const mapping = parseMapping(MAPPING);

  it('is 8 samples per declared note', () => {
    expect(categoryCapacity(mapping, 'kick')).toBe(8);
    expect(categoryCapacity(mapping, 'snare')).toBe(16);
    expect(categoryCapacity(mapping, 'crash')).toBe(0);
  });

  it('is undefined without a note list or outside the mapping', () => {
    expect(categoryCapacity(mapping, 'perc')).toBeUndefined();
    expect(categoryCapacity(mapping, 'cowbell')).toBeUndefined();
  });
});

describe('reservedNotes', () => {
  it('collects every note of every category', () => {
    expect([...reservedNotes(parseMapping(MAPPING))].sort((a, b) => a - b)).toEqual([36, 38, 40, 42, 43, 44]);
  });
});

describe('parseMidiNoteList', () => {
  it('expands, deduplicates and sorts', () => {
    expect(parseMidiNoteList('90, 82-84,83')).toEqual([82, 83, 84, 90]);
    expect(parseMidiNoteList('82-127')).toHaveLength(46);
  });

  it('returns an empty list for an empty spec', () => {
    expect(parseMidiNoteList('')).toEqual([]);
  });

  it('throws NoteSpecParseError on garbage', () => {
    expect(() => parseMidiNoteList('abc')).toThrow(NoteSpecParseError);
    expect(() => parseMidiNoteList('1-200')).toThrow(NoteSpecParseError);
  });
});
