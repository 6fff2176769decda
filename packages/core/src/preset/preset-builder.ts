import * as path from 'path';
import {
  DEFAULT_PANEL_MODE,
  DEFAULT_VOLUME,
  LAYER_LIMIT_PER_PAD,
  TALDRUM_VERSION,
} from '../config/constants';
import { randomPadColour } from './colour';
import { toLibraryRelativePath, toPresetRelativePath } from './paths';
import { velocityRanges } from './velocity';
import type { NoteAssignment } from '../assignment';
import type { RandomSource } from './colour';
import type { LayerSlot, PadSpec, PresetBuildOptions, PresetDocument } from './types';

const EMPTY_SLOT: LayerSlot = { path: '', pathRelative: '' };

function emptyLayers(): LayerSlot[] {
  return Array.from({ length: LAYER_LIMIT_PER_PAD }, () => ({ ...EMPTY_SLOT }));
}

/**
 * Layer slots for up to 8 samples, softest first. The first layer leaves its
 * lower velocity bound implicit, the last its upper bound; a single layer
 * covers the full range with neither.
 */
export function buildLayers(samples: readonly string[], presetDir: string, libraryRoot: string): LayerSlot[] {
  const placed = samples.slice(0, LAYER_LIMIT_PER_PAD);
  const n = placed.length;
  const ranges = velocityRanges(n);
  const layers = emptyLayers();

  placed.forEach((sample, i) => {
    const slot: LayerSlot = {
      path: toPresetRelativePath(sample, presetDir),
      pathRelative: toLibraryRelativePath(sample, libraryRoot),
    };
    const { start, end } = ranges[i];

    if (n > 1) {
      if (i > 0) slot.velocityStart = start;
      if (i < n - 1) slot.velocityEnd = end;
    }

    layers[i] = slot;
  });

  return layers;
}

/**
 * Builds the fixed pad grid for one kit. Pad i plays note padBaseNote + i;
 * assigned notes outside the grid are skipped. Every pad with samples gets
 * a colour from `random`, drawn in pad order.
 */
export function buildPreset(
  notes: NoteAssignment,
  options: PresetBuildOptions,
  random?: RandomSource
): PresetDocument {
  const presetDir = path.dirname(options.presetPath);
  const pads: PadSpec[] = [];

  for (let i = 0; i < options.padCount; i++) {
    const midiKey = options.padBaseNote + i;
    const samples = notes.get(midiKey) ?? [];
    const base = { index: i, name: `Pad ${i + 1}`, midiKey };

    if (samples.length === 0) {
      pads.push({ ...base, colour: 0, activeLayers: 0, layers: emptyLayers() });
      continue;
    }

    const layers = buildLayers(samples, presetDir, options.libraryRoot);
    pads.push({
      ...base,
      colour: randomPadColour(random),
      activeLayers: Math.min(samples.length, LAYER_LIMIT_PER_PAD),
      layers,
    });
  }

  return {
    version: TALDRUM_VERSION,
    path: options.presetPath.replace(/\\/g, '/'),
    name: options.name,
    volume: DEFAULT_VOLUME,
    panelMode: DEFAULT_PANEL_MODE,
    pads,
  };
}
