/**
 * Immutable description of a TAL-Drum preset, built from a note assignment
 * and rendered to XML in a separate pass.
 */

export type LayerSlot = {
  /** Sample path relative to the preset's directory; "" for an empty slot. */
  path: string;
  /** Sample path relative to the sample-library root; "" for an empty slot. */
  pathRelative: string;
  velocityStart?: number;
  velocityEnd?: number;
};

export type PadSpec = {
  index: number;
  name: string;
  midiKey: number;
  /** Signed 32-bit ARGB; 0 for pads without samples. */
  colour: number;
  activeLayers: number;
  /** Always LAYER_LIMIT_PER_PAD slots; unused ones are empty. */
  layers: readonly LayerSlot[];
};

export type PresetDocument = {
  version: string;
  /** Absolute path of the preset file, forward slashes. */
  path: string;
  name: string;
  volume: string;
  panelMode: string;
  pads: readonly PadSpec[];
};

export type PresetBuildOptions = {
  /** Absolute path the preset will be written to. */
  presetPath: string;
  name: string;
  /** Root that "pathrelative" attributes are relative to. */
  libraryRoot: string;
  padBaseNote: number;
  padCount: number;
};
