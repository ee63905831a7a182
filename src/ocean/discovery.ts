/**
 * Auxiliary file discovery.
 *
 * OCEAN writes no manifest: a file's role is its name prefix and its
 * polarization is encoded in the trailing characters of the spectra file
 * name (absspct_Ti.0001_1s_01 → photon1, abslanc_Ti.0001_1s_01).
 */

import * as fs from 'fs';
import * as path from 'path';

export const SPECTRA_PREFIX = 'absspct';
export const PHOTON_PREFIX = 'photon';
export const LANCZOS_PREFIX = 'abslanc';

/** Trailing characters of the key shared with each auxiliary file. */
export const PHOTON_TAG_WIDTH = 1;
export const LANCZOS_TAG_WIDTH = 2;

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** File names in `directory` with `prefix` (and `suffix`, when given), sorted lexically. */
export function findFiles(directory: string, prefix: string, suffix?: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch {
    return [];
  }
  return entries
    // Symlinks are kept; reading the target decides whether the file is usable.
    .filter(e => e.isFile() || e.isSymbolicLink())
    .map(e => e.name)
    .filter(name => name.startsWith(prefix) && (suffix === undefined || name.endsWith(suffix)))
    .sort(compareNames);
}

export function polarizationTag(key: string, width: number): string {
  return key.slice(-width);
}

export function listPolarizationKeys(directory: string): string[] {
  return findFiles(directory, SPECTRA_PREFIX);
}

export function findPhotonFile(directory: string, key: string): string | null {
  const [first] = findFiles(directory, PHOTON_PREFIX, polarizationTag(key, PHOTON_TAG_WIDTH));
  return first === undefined ? null : path.join(directory, first);
}

export function findLanczosFile(directory: string, key: string): string | null {
  const [first] = findFiles(directory, LANCZOS_PREFIX, polarizationTag(key, LANCZOS_TAG_WIDTH));
  return first === undefined ? null : path.join(directory, first);
}

export interface PolarizationFiles {
  key: string;
  spectra: string;
  photon: string | null;
  lanczos: string | null;
}

export function describePolarizations(directory: string): PolarizationFiles[] {
  return listPolarizationKeys(directory).map(key => ({
    key,
    spectra: path.join(directory, key),
    photon: findPhotonFile(directory, key),
    lanczos: findLanczosFile(directory, key),
  }));
}
