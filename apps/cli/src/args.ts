import { z } from 'zod';
import {
  DEFAULT_PAD_BASE_MIDI,
  DEFAULT_PAD_COUNT,
  DEFAULT_TRASH_NOTES_SPEC,
  OverflowPolicySchema,
} from '@kitsmith/core';
import type { EnvDefaults } from './env-config';

export const USAGE = `Usage:
  kitsmith listing <samples-folder> [--mapping <file>] [--min-total <n>]
      [--exclude-only-other] [--exclude-mixed-other]
      [--overflow-policy reject|truncate|trash|ignore] [--trash-notes <spec>]
      [--export-valid <file>] [--export-rejected <file>] [--print]

  kitsmith generate <listing-json> --mapping <file> --output-dir <dir>
      --global-sample-base <dir> [--overflow-policy reject|truncate|trash|ignore]
      [--trash-notes <spec>] [--pad-base-midi <n>] [--pad-count <n>] [--seed <n>]`;

const BOOLEAN_FLAGS = new Set(['exclude-only-other', 'exclude-mixed-other', 'print', 'help']);

export type RawArgs = {
  positionals: string[];
  flags: Map<string, string | true>;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Splits argv into positionals and `--flag value` / `--flag=value` pairs.
 */
export function tokenize(argv: readonly string[]): RawArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (eq !== -1) {
      flags.set(name, arg.slice(eq + 1));
    } else if (BOOLEAN_FLAGS.has(name)) {
      flags.set(name, true);
    } else {
      const value: string | undefined = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`Missing value for --${name}`);
      }
      flags.set(name, value);
      i++;
    }
  }

  return { positionals, flags };
}

const intFlag = z.coerce.number().int();

export const ListingArgsSchema = z.object({
  command: z.literal('listing'),
  samplesFolder: z.string().min(1),
  mapping: z.string().min(1).default('mapping.txt'),
  minTotal: intFlag.nonnegative().default(0),
  excludeOnlyOther: z.boolean().default(false),
  excludeMixedOther: z.boolean().default(false),
  overflowPolicy: OverflowPolicySchema.default('reject'),
  trashNotes: z.string().optional(),
  exportValid: z.string().optional(),
  exportRejected: z.string().optional(),
  print: z.boolean().default(false),
});

export const GenerateArgsSchema = z.object({
  command: z.literal('generate'),
  listingJson: z.string().min(1),
  mapping: z.string({ required_error: '--mapping is required' }).min(1),
  outputDir: z.string({ required_error: '--output-dir is required' }).min(1),
  globalSampleBase: z.string({ required_error: '--global-sample-base is required' }).min(1),
  overflowPolicy: OverflowPolicySchema.default('trash'),
  trashNotes: z.string().default(DEFAULT_TRASH_NOTES_SPEC),
  padBaseMidi: intFlag.min(0).max(127).default(DEFAULT_PAD_BASE_MIDI),
  padCount: intFlag.positive().max(128).default(DEFAULT_PAD_COUNT),
  seed: intFlag.optional(),
});

export type ListingArgs = z.infer<typeof ListingArgsSchema>;
export type GenerateArgs = z.infer<typeof GenerateArgsSchema>;
export type CliArgs = ListingArgs | GenerateArgs | { command: 'help' };

const KNOWN_FLAGS: Record<'listing' | 'generate', Set<string>> = {
  listing: new Set([
    'mapping',
    'min-total',
    'exclude-only-other',
    'exclude-mixed-other',
    'overflow-policy',
    'trash-notes',
    'export-valid',
    'export-rejected',
    'print',
  ]),
  generate: new Set([
    'mapping',
    'output-dir',
    'global-sample-base',
    'overflow-policy',
    'trash-notes',
    'pad-base-midi',
    'pad-count',
    'seed',
  ]),
};

function stringFlag(raw: RawArgs, name: string): string | undefined {
  const value = raw.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new UsageError(`Invalid arguments: ${issues}`);
  }
  return parsed.data;
}

/**
 * Parses `process.argv.slice(2)`. Path flags left out fall back to the
 * KITSMITH_* environment defaults.
 */
export function parseArgs(argv: readonly string[], env: EnvDefaults = {}): CliArgs {
  const raw = tokenize(argv);
  const command: string | undefined = raw.positionals[0];
  const target: string | undefined = raw.positionals[1];
  const extra = raw.positionals.slice(2);

  if (command === undefined || command === 'help' || raw.flags.has('help')) {
    return { command: 'help' };
  }
  if (command !== 'listing' && command !== 'generate') {
    throw new UsageError(`Unknown command: ${command}`);
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected arguments: ${extra.join(' ')}`);
  }
  for (const name of raw.flags.keys()) {
    if (!KNOWN_FLAGS[command].has(name)) {
      throw new UsageError(`Unknown option for ${command}: --${name}`);
    }
  }

  if (command === 'listing') {
    return validate(ListingArgsSchema, {
      command,
      samplesFolder: target,
      mapping: stringFlag(raw, 'mapping') ?? env.mapping,
      minTotal: stringFlag(raw, 'min-total'),
      excludeOnlyOther: raw.flags.has('exclude-only-other'),
      excludeMixedOther: raw.flags.has('exclude-mixed-other'),
      overflowPolicy: stringFlag(raw, 'overflow-policy'),
      trashNotes: stringFlag(raw, 'trash-notes'),
      exportValid: stringFlag(raw, 'export-valid'),
      exportRejected: stringFlag(raw, 'export-rejected'),
      print: raw.flags.has('print'),
    });
  }

  return validate(GenerateArgsSchema, {
    command,
    listingJson: target,
    mapping: stringFlag(raw, 'mapping') ?? env.mapping,
    outputDir: stringFlag(raw, 'output-dir') ?? env.outputDir,
    globalSampleBase: stringFlag(raw, 'global-sample-base') ?? env.sampleBase,
    overflowPolicy: stringFlag(raw, 'overflow-policy'),
    trashNotes: stringFlag(raw, 'trash-notes'),
    padBaseMidi: stringFlag(raw, 'pad-base-midi'),
    padCount: stringFlag(raw, 'pad-count'),
    seed: stringFlag(raw, 'seed'),
  });
}
