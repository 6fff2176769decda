import * as path from 'path';
import { PathEscapeError } from '../errors';

function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Path of a sample relative to the sample-library root ("pathrelative").
 * Throws PathEscapeError when the sample is not under the root.
 */
export function toLibraryRelativePath(samplePath: string, libraryRoot: string): string {
  const sampleAbs = path.resolve(samplePath);
  const rootAbs = path.resolve(libraryRoot);
  const rel = path.relative(rootAbs, sampleAbs);

  if (rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new PathEscapeError(sampleAbs, rootAbs);
  }

  return toPosix(rel);
}

/**
 * Path of a sample relative to the directory the preset is written to ("path").
 */
export function toPresetRelativePath(samplePath: string, presetDir: string): string {
  return toPosix(path.relative(path.resolve(presetDir), path.resolve(samplePath)));
}

const FORBIDDEN_FILENAME_CHARS = /[\\/:*?"<>|]+/g;

/**
 * Makes a kit name safe to use as a file name.
 */
export function sanitizeFilename(name: string, fallback: string): string {
  const cleaned = name
    .trim()
    .replace(FORBIDDEN_FILENAME_CHARS, '_')
    .replace(/\s+/g, ' ')
    .trim();
  return cleaned || fallback;
}
