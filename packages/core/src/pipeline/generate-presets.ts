import * as fs from 'fs';
import * as path from 'path';
import { TALDRUM_EXTENSION, UNTITLED_PRESET_NAME } from '../config/constants';
import { assignSamplesToNotes } from '../assignment';
import { GenerateOptionsSchema } from '../contracts';
import { buildPreset, createSeededRandom, renderPresetXml, sanitizeFilename } from '../preset';
import type { CapacityWarning } from '../assignment';
import type { GenerateOptionsInput } from '../contracts';
import type { KitCollection, KitElements } from '../kit';
import type { MappingTable } from '../mapping';
import type { RandomSource } from '../preset';

export type GenerateOptions = GenerateOptionsInput & {
  /** Overrides `seed`; defaults to Math.random when neither is given. */
  random?: RandomSource;
  onProgress?: (message: string) => void;
};

export type WrittenPreset = {
  kitName: string;
  presetPath: string;
  warnings: CapacityWarning[];
};

export type FailedPreset = {
  kitName: string;
  error: Error;
};

export type GenerateResult = {
  outputDir: string;
  written: WrittenPreset[];
  failed: FailedPreset[];
};

/**
 * Absolute path of the preset file for a kit.
 */
export function presetPathFor(outputDir: string, kitName: string): string {
  const safeName = sanitizeFilename(kitName, UNTITLED_PRESET_NAME);
  return path.resolve(outputDir, `${safeName}${TALDRUM_EXTENSION}`);
}

/**
 * Renders one kit to preset XML without touching the filesystem.
 */
export function renderKitPreset(
  kitName: string,
  elements: KitElements,
  mapping: MappingTable,
  options: GenerateOptionsInput,
  random?: RandomSource
): { presetPath: string; xml: string; warnings: CapacityWarning[] } {
  const presetPath = presetPathFor(options.outputDir, kitName);
  const { notes, warnings } = assignSamplesToNotes(elements, mapping, {
    overflowPolicy: options.overflowPolicy,
    trashNotes: options.trashNotes,
  });

  const doc = buildPreset(
    notes,
    {
      presetPath,
      name: sanitizeFilename(kitName, UNTITLED_PRESET_NAME),
      libraryRoot: options.libraryRoot,
      padBaseNote: options.padBaseNote,
      padCount: options.padCount,
    },
    random
  );

  return { presetPath, xml: renderPresetXml(doc), warnings };
}

/**
 * Writes one TAL-Drum preset per kit into the output directory.
 *
 * Kits are processed one after another. A kit whose preset cannot be built
 * (a sample outside the library root, an unwritable file) is recorded in
 * `failed` and the remaining kits still run.
 */
export function generatePresets(
  kits: KitCollection,
  mapping: MappingTable,
  options: GenerateOptions
): GenerateResult {
  const { random: injectedRandom, onProgress, ...rest } = options;
  const config = GenerateOptionsSchema.parse(rest);
  const random =
    injectedRandom ?? (config.seed !== undefined ? createSeededRandom(config.seed) : undefined);

  const outputDir = path.resolve(config.outputDir);
  fs.mkdirSync(outputDir, { recursive: true });

  const result: GenerateResult = { outputDir, written: [], failed: [] };

  for (const [kitName, elements] of kits) {
    try {
      const rendered = renderKitPreset(kitName, elements, mapping, { ...config, outputDir }, random);
      fs.writeFileSync(rendered.presetPath, rendered.xml, 'utf-8');
      result.written.push({ kitName, presetPath: rendered.presetPath, warnings: rendered.warnings });

      for (const warning of rendered.warnings) {
        console.warn(`[Generator] ${kitName}: ${warning.message}`);
      }
      onProgress?.(`Wrote ${rendered.presetPath}`);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      console.error(`[Generator] Failed to generate preset for "${kitName}": ${error.message}`);
      result.failed.push({ kitName, error });
    }
  }

  console.log(
    `[Generator] Generation complete → ${outputDir} (${result.written.length} written, ${result.failed.length} failed)`
  );

  return result;
}
