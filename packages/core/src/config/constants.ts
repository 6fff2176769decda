/**
 * Tunables shared by the classifier, filter, assignment engine and preset writer.
 * Change a number here and every stage picks it up.
 */

// ============================================================================
// SAMPLE DISCOVERY
// ============================================================================

/** File extensions (lowercase, with leading ".") treated as audio samples. */
export const AUDIO_EXTENSIONS = new Set(['.wav', '.aif', '.aiff', '.flac']);

/** Category assigned when no synonym matches a filename. */
export const OTHER_CATEGORY = 'other';

/** Kit name used when nothing is left of a filename after stripping. */
export const UNKNOWN_KIT_NAME = 'UNKNOWN';

// ============================================================================
// PAD CAPACITY
// ============================================================================

/** Maximum number of velocity layers a single pad (MIDI note) can hold. */
export const LAYER_LIMIT_PER_PAD = 8;

/** Lowest and highest valid MIDI note numbers. */
export const MIDI_NOTE_MIN = 0;
export const MIDI_NOTE_MAX = 127;

/** Trash notes used when none are configured (C6..G9). */
export const DEFAULT_TRASH_NOTES_SPEC = '82-127';

// ============================================================================
// TAL-DRUM PRESET
// ============================================================================

export const TALDRUM_VERSION = '13';
export const TALDRUM_EXTENSION = '.taldrum';
export const DEFAULT_VOLUME = '0.75';
export const DEFAULT_PANEL_MODE = '0';

export const DEFAULT_PAD_COUNT = 64;
export const DEFAULT_PAD_BASE_MIDI = 36; // C2

/** Top of the MIDI velocity range; layers partition 1..VELOCITY_MAX. */
export const VELOCITY_MAX = 127;

/** Pad colours whose channel spread (max - min) is below this look gray and are resampled. */
export const MIN_COLOUR_SPREAD = 80;

/** Preset name used when a kit name sanitizes to nothing. */
export const UNTITLED_PRESET_NAME = 'UNTITLED';
