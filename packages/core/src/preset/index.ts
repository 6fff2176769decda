export { createSeededRandom, isVividColour, randomPadColour, toSignedArgb } from './colour';
export type { RandomSource, Rgb } from './colour';
export { sanitizeFilename, toLibraryRelativePath, toPresetRelativePath } from './paths';
export { buildLayers, buildPreset } from './preset-builder';
export { escapeAttribute, floatString, renderPresetXml } from './xml-renderer';
export { velocityRanges } from './velocity';
export type { VelocityRange } from './velocity';
export type { LayerSlot, PadSpec, PresetBuildOptions, PresetDocument } from './types';
