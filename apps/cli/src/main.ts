import {
  DEFAULT_TRASH_NOTES_SPEC,
  FilterOptionsSchema,
  createListing,
  generatePresets,
  loadMappingFile,
  parseMidiNoteList,
  readListing,
  writeListing,
  writeRejectedListing,
} from '@kitsmith/core';
import { EnvConfig } from './env-config';
import { USAGE, UsageError, parseArgs } from './args';
import { formatGenerateTally, formatListing, formatRejected, print } from './report';
import type { GenerateArgs, ListingArgs } from './args';

function runListing(args: ListingArgs): number {
  const mapping = loadMappingFile(args.mapping);

  // Trash notes only matter for the trash policy's capacity check
  const trashNotes =
    args.overflowPolicy === 'trash' ? parseMidiNoteList(args.trashNotes ?? DEFAULT_TRASH_NOTES_SPEC) : [];

  const filterOptions = FilterOptionsSchema.parse({
    minTotalSamples: args.minTotal,
    excludeOnlyOther: args.excludeOnlyOther,
    excludeMixedOther: args.excludeMixedOther,
    overflowPolicy: args.overflowPolicy,
    trashNotes,
  });

  const result = createListing(args.samplesFolder, mapping, filterOptions);
  for (const error of result.errors) {
    console.warn(`[CLI] ${error}`);
  }

  console.log(`\nVALID KITS : ${result.valid.size}`);
  if (args.print) {
    print(formatListing(result.valid));
  }

  console.log(`\nREJECTED KITS : ${result.rejected.size}`);
  print(formatRejected(result.rejected));

  if (args.exportValid) {
    writeListing(args.exportValid, result.valid);
    console.log(`\nValid exported to ${args.exportValid}`);
  }
  if (args.exportRejected) {
    writeRejectedListing(args.exportRejected, result.rejected);
    console.log(`\nRejected exported to ${args.exportRejected}`);
  }

  return 0;
}

function runGenerate(args: GenerateArgs): number {
  const kits = readListing(args.listingJson);
  const mapping = loadMappingFile(args.mapping);
  const trashNotes = parseMidiNoteList(args.trashNotes);

  const result = generatePresets(kits, mapping, {
    outputDir: args.outputDir,
    libraryRoot: args.globalSampleBase,
    overflowPolicy: args.overflowPolicy,
    trashNotes,
    padBaseNote: args.padBaseMidi,
    padCount: args.padCount,
    seed: args.seed,
  });

  print(formatGenerateTally(result));
  return result.failed.length > 0 ? 1 : 0;
}

/**
 * Runs one CLI invocation and returns the process exit code.
 * Fatal errors (bad arguments, unreadable mapping or listing) are reported
 * here; per-kit problems are part of the normal output.
 */
export function run(argv: readonly string[], envConfig: EnvConfig = new EnvConfig()): number {
  try {
    envConfig.load();
    const args = parseArgs(argv, envConfig.defaults());

    switch (args.command) {
      case 'help':
        console.log(USAGE);
        return 0;
      case 'listing':
        return runListing(args);
      case 'generate':
        return runGenerate(args);
    }
  } catch (error) {
    console.error(`[CLI] ${error instanceof Error ? error.message : 'Unknown error'}`);
    if (error instanceof UsageError) {
      console.error(USAGE);
    }
    return 1;
  }
}
