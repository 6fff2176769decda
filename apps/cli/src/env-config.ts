import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';

export type EnvDefaults = {
  mapping?: string;
  outputDir?: string;
  sampleBase?: string;
};

type EnvConfigOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export const ENV_KEYS = {
  mapping: 'KITSMITH_MAPPING',
  outputDir: 'KITSMITH_OUTPUT_DIR',
  sampleBase: 'KITSMITH_SAMPLE_BASE',
} as const;

/**
 * Loads `.env` from the working directory (if present) and exposes the
 * KITSMITH_* defaults used when a path flag is not given.
 */
export class EnvConfig {
  private readonly envPath: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: EnvConfigOptions = {}) {
    this.envPath = path.join(options.cwd ?? process.cwd(), '.env');
    this.env = options.env ?? process.env;
  }

  /**
   * Merges `.env` into the environment. Variables already set win.
   */
  load(): boolean {
    if (!fs.existsSync(this.envPath)) {
      return false;
    }
    let parsed: Record<string, string>;
    try {
      parsed = dotenv.parse(fs.readFileSync(this.envPath, 'utf8'));
    } catch (err) {
      console.warn(`[CLI] Could not read ${this.envPath}: ${err instanceof Error ? err.message : err}`);
      return false;
    }
    for (const [key, value] of Object.entries(parsed)) {
      if (this.env[key] === undefined) {
        this.env[key] = value;
      }
    }
    console.log(`[CLI] Loaded .env from: ${this.envPath}`);
    return true;
  }

  defaults(): EnvDefaults {
    return {
      mapping: this.read(ENV_KEYS.mapping),
      outputDir: this.read(ENV_KEYS.outputDir),
      sampleBase: this.read(ENV_KEYS.sampleBase),
    };
  }

  private read(key: string): string | undefined {
    const value = this.env[key]?.trim();
    return value ? value : undefined;
  }
}
