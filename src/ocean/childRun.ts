/**
 * One entry per polarization: program, structure, photon + BSE method,
 * spectra calculation and a single-point workflow.
 */

import * as fs from 'fs';
import * as path from 'path';

import {
  appendSection,
  createArchive,
  createRun,
  lastOf,
  type Atoms,
  type Calculation,
  type EntryArchive,
  type LanczosResults,
  type Method,
  type Program,
  type Run,
  type Spectra,
  type System,
} from '../archive/sections.js';
import { isMappingError, type Logger } from '../shared/index.js';
import type { OceanConfig, OceanStructure } from './config.js';
import { findLanczosFile, findPhotonFile } from './discovery.js';
import { resolveAtomLabels } from './elements.js';
import { mapMethod } from './methodMapper.js';
import { parseLanczosFile, type LanczosData } from './parseLanczos.js';
import { parsePhotonFile, photonFromFile } from './parsePhoton.js';
import { parseSpectraFile, type SpectraTable } from './parseSpectra.js';
import { convertArray, convertMatrix } from './units.js';

export const PROGRAM_NAME = 'OCEAN';

const DFT_CODE_NAMES: Record<string, string> = {
  qe: 'QuantumESPRESSO',
  abi: 'ABINIT',
};

export interface ChildRun {
  /** Spectra file name; also the entry key. */
  key: string;
  archive: EntryArchive;
}

function readText(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
}

export function buildProgram(config: OceanConfig): Program {
  const program: Program = { name: PROGRAM_NAME };
  const version = config.version;
  if (version?.['.'] !== undefined) program.version = version['.'];
  if (version?.hash !== undefined) program.x_ocean_commit_hash = version.hash;
  const dftCode = config.dft?.program;
  const dftName = dftCode === undefined ? undefined : DFT_CODE_NAMES[dftCode];
  if (dftName !== undefined) program.x_ocean_original_dft_code = dftName;
  return program;
}

export function buildSystem(structure: OceanStructure): System {
  const atoms: Atoms = {};

  if (structure.avecs) {
    atoms.lattice_vectors = convertMatrix(structure.avecs, 'bohr', 'meter');
    atoms.periodic = [true, true, true];
  }
  if (structure.bvecs) {
    atoms.lattice_vectors_reciprocal = convertMatrix(structure.bvecs, '1/bohr', '1/meter');
  }
  if (structure.znucl && structure.typat) {
    const labels = resolveAtomLabels(structure.znucl, structure.typat);
    if (labels) atoms.labels = labels;
  }
  if (structure.xangst) {
    atoms.positions = convertMatrix(structure.xangst, 'angstrom', 'meter');
  }

  return { atoms };
}

export function lanczosResults(data: LanczosData): LanczosResults {
  return {
    x_ocean_n_tridiagonal_matrix: data.dimension,
    x_ocean_scaling_factor: data.scaling_factor,
    x_ocean_tridiagonal_matrix: data.tridiagonal,
    x_ocean_eigenvalues: data.eigenvalues,
  };
}

function buildPhotonMethod(run: Run, key: string, directory: string): Method {
  const photonMethod = appendSection(run.method, {});
  const photonFile = findPhotonFile(directory, key);
  if (photonFile === null) return photonMethod;
  const content = readText(photonFile);
  if (content === null) return photonMethod;
  photonMethod.photon = photonFromFile(parsePhotonFile(content));
  return photonMethod;
}

function buildBseMethod(run: Run, config: OceanConfig, key: string, logger: Logger): Method | undefined {
  let method: Method;
  try {
    method = mapMethod(config);
  } catch (err) {
    if (!isMappingError(err)) throw err;
    logger.error(`Cannot map BSE method for ${key}: ${err.message}`, { key, ...toRecord(err.data) });
    return undefined;
  }
  const previous = lastOf(run.method);
  if (previous?.photon) method.starting_method_ref = previous;
  return appendSection(run.method, method);
}

function toRecord(data: unknown): Record<string, unknown> {
  return typeof data === 'object' && data !== null ? { ...data } : { data };
}

function buildCalculation(
  run: Run,
  system: System,
  config: OceanConfig,
  key: string,
  directory: string,
  table: SpectraTable,
): Calculation {
  const spectra: Spectra = {
    n_energies: table.energies.length,
    excitation_energies: convertArray(table.energies, 'eV', 'joule'),
    intensities: table.intensities,
  };
  const mode = config.calc?.mode;
  if (mode !== undefined) spectra.type = mode.toUpperCase();

  const calculation = appendSection(run.calculation, {
    system_ref: system,
    method_ref: lastOf(run.method),
    spectra: [spectra],
  });

  const lanczosFile = findLanczosFile(directory, key);
  if (lanczosFile === null) return calculation;
  const lanczosContent = readText(lanczosFile);
  const lanczos = lanczosContent === null ? null : parseLanczosFile(lanczosContent);
  if (lanczos) calculation.x_ocean_lanczos_results = lanczosResults(lanczos);
  return calculation;
}

/**
 * Build the entry for one polarization key.
 *
 * Returns null when the spectra file cannot be read or holds no rows; the
 * key is then dropped. Without structure data the entry keeps only its
 * program and is not complete.
 */
export function buildChildRun(
  key: string,
  config: OceanConfig,
  directory: string,
  logger: Logger,
): ChildRun | null {
  const spectraContent = readText(path.join(directory, key));
  if (spectraContent === null) {
    logger.warn(`Cannot read spectra file ${key}; skipping this polarization.`, { key });
    return null;
  }
  const table = parseSpectraFile(spectraContent);
  if (table.energies.length === 0) {
    logger.warn(`Spectra file ${key} has no data rows; skipping this polarization.`, { key });
    return null;
  }

  const archive = createArchive();
  const run = createRun(archive);
  run.program = buildProgram(config);

  if (!config.structure) {
    logger.error('Error finding the structure in the main output file.', { key });
    return { key, archive };
  }
  const system = appendSection(run.system, buildSystem(config.structure));

  buildPhotonMethod(run, key, directory);
  buildBseMethod(run, config, key, logger);
  buildCalculation(run, system, config, key, directory, table);

  archive.workflow = { type: 'single_point' };
  return { key, archive };
}

/** Program, system, method and calculation are all present. */
export function isCompleteChild(child: ChildRun): boolean {
  const run = lastOf(child.archive.run);
  return Boolean(
    run?.program &&
    run.system.length > 0 &&
    run.method.length > 0 &&
    run.calculation.length > 0 &&
    child.archive.workflow,
  );
}
