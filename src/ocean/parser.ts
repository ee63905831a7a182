/**
 * Entry point: main JSON + auxiliary files → child entries + workflow entry.
 */

import * as path from 'path';

import { createStderrLogger, type Logger } from '../shared/index.js';
import { buildChildRun, type ChildRun } from './childRun.js';
import { loadOceanConfig, type OceanConfig } from './config.js';
import { listPolarizationKeys } from './discovery.js';
import { aggregateWorkflow } from './workflow.js';
import type { EntryArchive } from '../archive/sections.js';

export interface OceanParseOptions {
  logger?: Logger;
}

export interface OceanParseResult {
  mainfile: string;
  directory: string;
  config: OceanConfig;
  /** In discovery (lexical file name) order. */
  children: ChildRun[];
  workflow: EntryArchive;
}

/**
 * Parse one OCEAN run. Returns null when the main file cannot be loaded;
 * every other problem is logged and confined to the unit it affects.
 */
export function parseOceanRun(mainfile: string, options: OceanParseOptions = {}): OceanParseResult | null {
  const logger = options.logger ?? createStderrLogger();
  const resolved = path.resolve(mainfile);
  const directory = path.dirname(resolved);

  const loaded = loadOceanConfig(resolved);
  if (!loaded.ok) {
    logger.error('Error opening json output file.', {
      mainfile: resolved,
      reason: loaded.reason,
      ...(loaded.issues !== undefined ? { issues: loaded.issues } : {}),
    });
    return null;
  }
  const config = loaded.config;

  const children: ChildRun[] = [];
  for (const key of listPolarizationKeys(directory)) {
    const child = buildChildRun(key, config, directory, logger);
    if (child) children.push(child);
  }
  logger.info(`Built ${children.length} polarization entries`, { directory });

  const workflow = aggregateWorkflow(children, config, logger);
  return { mainfile: resolved, directory, config, children, workflow };
}
