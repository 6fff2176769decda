import * as fs from 'fs';
import * as path from 'path';
import { AUDIO_EXTENSIONS } from '../config/constants';
import { detectCategory, extractKitName } from '../classifier';
import { addSample } from '../kit';
import type { KitCollection } from '../kit';
import type { Nomenclature } from '../mapping';

// Deeper trees are reported and skipped
const MAX_DEPTH = 100;

export interface SampleScanResult {
  kits: KitCollection;
  filesScanned: number;
  samplesFound: number;
  foldersScanned: number;
  errors: string[];
}

export interface SampleFileInfo {
  filePath: string;
  name: string;
  extension: string;
}

interface StackEntry {
  path: string;
  depth: number;
}

/**
 * Hidden files (".DS_Store", "._Kick 1.wav" sidecars) are never samples.
 * Hidden folders are still walked.
 */
function isHiddenFile(dirent: fs.Dirent): boolean {
  return dirent.isFile() && dirent.name.startsWith('.');
}

export function isAudioFile(name: string): boolean {
  return AUDIO_EXTENSIONS.has(path.extname(name).toLowerCase());
}

/**
 * Iterative depth-first walk. Entries are visited in name order so repeated
 * scans of the same tree group samples identically.
 */
export function walkSampleTree(
  root: string,
  onFile: (file: SampleFileInfo) => void,
  onError?: (error: string) => void
): { filesFound: number; foldersFound: number } {
  const stack: StackEntry[] = [{ path: root, depth: 0 }];
  let filesFound = 0;
  let foldersFound = 0;

  const report = (errorMsg: string) => {
    if (onError) {
      onError(errorMsg);
    }
    console.warn(`[Crawler] ${errorMsg}`);
  };

  for (let entry = stack.pop(); entry !== undefined; entry = stack.pop()) {
    const { path: currentPath, depth } = entry;

    if (depth > MAX_DEPTH) {
      report(`Maximum depth exceeded: ${currentPath}`);
      continue;
    }

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(currentPath, { withFileTypes: true });
    } catch (err) {
      report(`Cannot read directory ${currentPath}: ${err}`);
      continue;
    }

    if (currentPath !== root) {
      foldersFound++;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const subdirectories: StackEntry[] = [];
    for (const dirent of entries) {
      if (isHiddenFile(dirent)) continue;

      const fullPath = path.join(currentPath, dirent.name);
      if (dirent.isDirectory()) {
        subdirectories.push({ path: fullPath, depth: depth + 1 });
      } else if (dirent.isFile()) {
        filesFound++;
        onFile({
          filePath: fullPath,
          name: dirent.name,
          extension: path.extname(dirent.name).toLowerCase(),
        });
      }
    }

    // Reverse so the alphabetically first folder is popped first
    for (let i = subdirectories.length - 1; i >= 0; i--) {
      stack.push(subdirectories[i]);
    }
  }

  return { filesFound, foldersFound };
}

/**
 * Scans a sample folder and groups every audio file into a kit by its
 * derived kit name and detected category. Paths are absolute.
 */
export function scanSamples(root: string, nomenclature: Nomenclature): SampleScanResult {
  const rootAbs = path.resolve(root);
  const result: SampleScanResult = {
    kits: new Map(),
    filesScanned: 0,
    samplesFound: 0,
    foldersScanned: 0,
    errors: [],
  };

  if (!fs.existsSync(rootAbs)) {
    result.errors.push(`Sample folder does not exist: ${rootAbs}`);
    return result;
  }

  console.log(`[Crawler] Scanning samples in ${rootAbs}`);

  const walk = walkSampleTree(
    rootAbs,
    (file) => {
      if (!isAudioFile(file.name)) return;

      const category = detectCategory(file.name, nomenclature);
      const kitName = extractKitName(file.name, category);
      addSample(result.kits, kitName, category, file.filePath);
      result.samplesFound++;
    },
    (error) => result.errors.push(error)
  );

  result.filesScanned = walk.filesFound;
  result.foldersScanned = walk.foldersFound;

  console.log(
    `[Crawler] Found ${result.samplesFound} samples in ${result.kits.size} kits ` +
      `(${result.filesScanned} files, ${result.foldersScanned} folders)`
  );

  return result;
}
