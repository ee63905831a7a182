import * as fs from 'fs';
import * as path from 'path';
import { invalidParams } from './errors.js';

export const MAINFILE_ENV = 'OCEAN_MAINFILE';

export function validateFilePath(filePath: string, label: string): string {
  if (!path.isAbsolute(filePath)) {
    throw invalidParams(`${label} must be an absolute path`, { param: label, value: filePath });
  }

  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw invalidParams(`${label} does not exist`, { param: label, value: resolved });
  }

  const stat = fs.statSync(resolved);
  if (!stat.isFile()) {
    throw invalidParams(`${label} must point to a file`, { param: label, value: resolved });
  }

  return resolved;
}

export function resolvePathFromEnv(envName: string): string | undefined {
  const raw = process.env[envName];
  if (!raw || raw.trim().length === 0) return undefined;
  return validateFilePath(raw.trim(), envName);
}

/** Explicit tool argument first, then OCEAN_MAINFILE. */
export function resolveMainfile(explicit: string | undefined): string {
  if (explicit !== undefined) return validateFilePath(explicit, 'mainfile');
  const fromEnv = resolvePathFromEnv(MAINFILE_ENV);
  if (!fromEnv) {
    throw invalidParams(`No mainfile given and ${MAINFILE_ENV} is not set`, { env: MAINFILE_ENV });
  }
  return fromEnv;
}
