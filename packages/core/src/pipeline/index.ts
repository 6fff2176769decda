export { createListing } from './create-listing';
export type { CreateListingResult } from './create-listing';
export { generatePresets, presetPathFor, renderKitPreset } from './generate-presets';
export type { FailedPreset, GenerateOptions, GenerateResult, WrittenPreset } from './generate-presets';
