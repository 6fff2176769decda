import * as path from 'path';
import { kitStats } from '@kitsmith/core';
import type { GenerateResult, KitCollection, RejectedKit } from '@kitsmith/core';

/**
 * Console output for the CLI. Every function returns its lines so tests can
 * check them; `print` writes them out.
 */

export function formatListing(kits: KitCollection): string[] {
  const lines = [`TOTAL KITS : ${kits.size}`];
  for (const [kitName, elements] of kits) {
    lines.push('', `=== KIT : ${kitName} ===`, `  Total samples : ${kitStats(elements).total}`);
    for (const [category, files] of elements) {
      lines.push(`  ${category} (${files.length})`);
      for (const file of files) {
        lines.push(`    - ${path.basename(file)}`);
      }
    }
  }
  return lines;
}

export function formatRejected(rejected: Map<string, RejectedKit>): string[] {
  const lines: string[] = [];
  for (const [kitName, kit] of rejected) {
    const parts = [`${kitName}: ${kit.reason}`];
    if (kit.details.trashNeeded !== undefined) {
      parts.push(`trash needed ${kit.details.trashNeeded}, capacity ${kit.details.trashCapacity ?? 0}`);
    }
    for (const o of kit.details.overflow ?? []) {
      parts.push(`${o.category} ${o.count}/${o.capacity}`);
    }
    if (kit.details.otherCount) {
      parts.push(`other ${kit.details.otherCount}`);
    }
    lines.push(`  - ${parts.join(', ')}`);
  }
  return lines;
}

export function formatGenerateTally(result: GenerateResult): string[] {
  const lines = [`PRESETS WRITTEN : ${result.written.length}`];
  for (const preset of result.written) {
    if (preset.warnings.length === 0) continue;
    lines.push(`  ${preset.kitName}:`);
    for (const warning of preset.warnings) {
      lines.push(`    ! ${warning.message}`);
    }
  }
  lines.push(`PRESETS FAILED : ${result.failed.length}`);
  for (const failure of result.failed) {
    lines.push(`  - ${failure.kitName}: ${failure.error.message}`);
  }
  lines.push(`Generation complete → ${result.outputDir}`);
  return lines;
}

export function print(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}
