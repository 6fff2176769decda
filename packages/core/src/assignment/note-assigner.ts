import { LAYER_LIMIT_PER_PAD, OTHER_CATEGORY } from '../config/constants';
import { reservedNotes } from '../mapping';
import type { MappingTable } from '../mapping';
import type { KitElements } from '../kit';
import type { AssignmentOptions, AssignmentResult, CapacityWarning, NoteAssignment } from './types';

/**
 * Trash notes that no category has reserved, in configured order.
 */
export function buildTrashPool(mapping: MappingTable, trashNotes: readonly number[]): number[] {
  const reserved = reservedNotes(mapping);
  return trashNotes.filter((note) => !reserved.has(note));
}

/**
 * Places one accepted kit's samples onto MIDI notes.
 *
 * Each category fills its reserved notes in order, up to 8 samples a note.
 * What does not fit (and everything in "other") is dropped or sent to the
 * trash pool depending on the overflow policy.
 */
export function assignSamplesToNotes(
  elements: KitElements,
  mapping: MappingTable,
  options: AssignmentOptions
): AssignmentResult {
  const notes: NoteAssignment = new Map();
  const warnings: CapacityWarning[] = [];
  const trashPool = buildTrashPool(mapping, options.trashNotes);
  const usesTrash = options.overflowPolicy === 'trash' || options.overflowPolicy === 'ignore';

  const freeSpace = (note: number): number => LAYER_LIMIT_PER_PAD - (notes.get(note)?.length ?? 0);

  const place = (note: number, samples: string[]): void => {
    const current = notes.get(note);
    if (current) {
      current.push(...samples);
    } else {
      notes.set(note, [...samples]);
    }
  };

  const pushTrash = (samples: string[]): void => {
    let idx = 0;
    while (idx < samples.length && trashPool.length > 0) {
      const note = trashPool[0];
      const space = freeSpace(note);
      if (space <= 0) {
        trashPool.shift();
        continue;
      }

      const take = samples.slice(idx, idx + space);
      place(note, take);
      idx += take.length;

      if (freeSpace(note) <= 0) {
        trashPool.shift();
      }
    }

    const dropped = samples.length - idx;
    if (dropped > 0) {
      warnings.push({
        kind: 'trash_full',
        dropped,
        message: `Dropped ${dropped} samples (trash full)`,
      });
    }
  };

  for (const [category, files] of elements) {
    if (category === OTHER_CATEGORY) {
      if (usesTrash && files.length > 0) {
        pushTrash(files);
      }
      continue;
    }

    const categoryNotes = mapping.get(category)?.midiNotes ?? [];

    let idx = 0;
    for (const note of categoryNotes) {
      if (idx >= files.length) break;
      const space = freeSpace(note);
      if (space <= 0) continue;

      const chunk = files.slice(idx, idx + space);
      place(note, chunk);
      idx += chunk.length;
    }

    const overflow = files.slice(idx);
    if (overflow.length === 0) continue;

    if (options.overflowPolicy === 'truncate') {
      warnings.push({
        kind: 'truncated',
        category,
        dropped: overflow.length,
        message: `Overflow in ${category}, truncated ${overflow.length}`,
      });
    } else if (usesTrash) {
      pushTrash(overflow);
    }
  }

  return { notes, warnings };
}
