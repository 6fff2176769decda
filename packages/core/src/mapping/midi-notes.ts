import { MIDI_NOTE_MAX, MIDI_NOTE_MIN } from '../config/constants';

const SINGLE_NOTE = /^\d+$/;
const NOTE_RANGE = /^(\d+)\s*-\s*(\d+)$/;

/**
 * Expands one comma-separated token ("36" or "40-43") into note numbers.
 * Throws a plain Error with a short reason; callers wrap it with context.
 */
export function expandNoteToken(token: string): number[] {
  if (SINGLE_NOTE.test(token)) {
    return [checkNote(Number(token))];
  }

  const range = NOTE_RANGE.exec(token);
  if (!range) {
    throw new Error(`"${token}" is not a note number or a range`);
  }

  const start = checkNote(Number(range[1]));
  const end = checkNote(Number(range[2]));
  if (start > end) {
    throw new Error(`range "${token}" runs backwards`);
  }

  const notes: number[] = [];
  for (let n = start; n <= end; n++) {
    notes.push(n);
  }
  return notes;
}

/**
 * Expands a comma-separated list of notes and ranges, keeping the order in
 * which notes first appear and dropping repeats.
 */
export function expandNoteList(spec: string): number[] {
  const seen = new Set<number>();
  const notes: number[] = [];

  const tokens = spec
    .split(',')
    .map((t) => t.trim())
    .filter((t) => t.length > 0);

  for (const token of tokens) {
    for (const note of expandNoteToken(token)) {
      if (!seen.has(note)) {
        seen.add(note);
        notes.push(note);
      }
    }
  }

  return notes;
}

function checkNote(note: number): number {
  if (!Number.isInteger(note) || note < MIDI_NOTE_MIN || note > MIDI_NOTE_MAX) {
    throw new Error(`note ${note} is outside ${MIDI_NOTE_MIN}-${MIDI_NOTE_MAX}`);
  }
  return note;
}
