import type { OverflowPolicy } from '../filter';

/**
 * MIDI note → samples in layer order (softest first), at most 8 per note.
 */
export type NoteAssignment = Map<number, string[]>;

export type CapacityWarning = {
  kind: 'truncated' | 'trash_full';
  /** Set for "truncated": the category that lost samples. */
  category?: string;
  dropped: number;
  message: string;
};

export type AssignmentOptions = {
  overflowPolicy: OverflowPolicy;
  trashNotes: number[];
};

export type AssignmentResult = {
  notes: NoteAssignment;
  warnings: CapacityWarning[];
};
