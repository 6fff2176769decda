import { z } from 'zod';
import { MIDI_NOTE_MAX } from '../config/constants';
import { OVERFLOW_POLICIES } from '../filter/types';

// ============================================================================
// Listing Schema (kit → category → absolute sample paths)
// ============================================================================

export const KitElementsSchema = z.record(z.string(), z.array(z.string()));

export const ListingSchema = z.record(z.string(), KitElementsSchema);

export type KitElementsJson = z.infer<typeof KitElementsSchema>;
export type ListingJson = z.infer<typeof ListingSchema>;

// ============================================================================
// Rejected Listing Schema
// ============================================================================

export const RejectionReasonSchema = z.enum([
  'too_few_samples',
  'only_other',
  'mixed_other',
  'overflow_or_other',
  'trash_zone_insufficient',
]);

export const CategoryOverflowSchema = z.object({
  category: z.string(),
  count: z.number().int().nonnegative(),
  capacity: z.number().int().nonnegative(),
});

export const RejectionDetailsSchema = z.object({
  overflow: z.array(CategoryOverflowSchema).optional(),
  other_count: z.number().int().nonnegative().optional(),
  trash_needed: z.number().int().nonnegative().optional(),
  trash_capacity: z.number().int().nonnegative().optional(),
});

export const RejectedKitSchema = z.object({
  reason: RejectionReasonSchema,
  details: RejectionDetailsSchema,
  elements: KitElementsSchema,
});

export const RejectedListingSchema = z.record(z.string(), RejectedKitSchema);

export type RejectedKitJson = z.infer<typeof RejectedKitSchema>;
export type RejectedListingJson = z.infer<typeof RejectedListingSchema>;

// ============================================================================
// Option Schemas
// ============================================================================

export const OverflowPolicySchema = z.enum(OVERFLOW_POLICIES);

const MidiNoteSchema = z.number().int().min(0).max(127);

export const FilterOptionsSchema = z.object({
  minTotalSamples: z.number().int().nonnegative(),
  excludeOnlyOther: z.boolean(),
  excludeMixedOther: z.boolean(),
  overflowPolicy: OverflowPolicySchema,
  trashNotes: z.array(MidiNoteSchema),
});

export const GenerateOptionsSchema = z.object({
  outputDir: z.string().min(1),
  libraryRoot: z.string().min(1),
  overflowPolicy: OverflowPolicySchema,
  trashNotes: z.array(MidiNoteSchema),
  padBaseNote: MidiNoteSchema,
  padCount: z.number().int().positive().max(128),
  seed: z.number().int().optional(),
}).refine((options) => options.padBaseNote + options.padCount - 1 <= MIDI_NOTE_MAX, {
  message: `Pad grid must end at or below MIDI note ${MIDI_NOTE_MAX}`,
  path: ['padCount'],
});

export type GenerateOptionsInput = z.infer<typeof GenerateOptionsSchema>;
