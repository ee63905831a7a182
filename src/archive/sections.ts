/**
 * Result graph sections.
 *
 * Every section is a plain object owned by exactly one parent. Fields named
 * `*_ref`, `section`, `task` and `spectrum_polarization` point at sections
 * owned elsewhere and never take ownership. Quantities are stored in SI
 * units (meter, 1/meter, joule).
 */

export type Vector3 = [number, number, number];
export type Matrix3 = [Vector3, Vector3, Vector3];

export interface Program {
  name?: string;
  version?: string;
  x_ocean_commit_hash?: string;
  x_ocean_original_dft_code?: string;
}

export interface Atoms {
  labels?: string[];
  positions?: number[][];
  lattice_vectors?: number[][];
  lattice_vectors_reciprocal?: number[][];
  periodic?: [boolean, boolean, boolean];
}

export interface System {
  atoms?: Atoms;
}

export interface Photon {
  multipole_type?: string;
  polarization?: Vector3;
  momentum_transfer?: Vector3;
  energy?: number;
}

export interface KMesh {
  grid?: number[];
}

export type CoreHoleMode = 'emission' | 'absorption';
export type CoreHoleSolver = 'lanczos-haydock' | 'gmres';
export type CoreLevelEdge = 'K' | 'L23';

export interface CoreHole {
  mode: CoreHoleMode;
  solver: CoreHoleSolver;
  edge: CoreLevelEdge;
  broadening?: number;
}

export interface BSE {
  type: CoreHoleSolver;
  n_empty_states?: number;
  screening_type?: string;
  dielectric_infinity?: number;
  n_empty_states_screening?: number;
  k_mesh_screening: KMesh;
  core_hole: CoreHole;
}

export interface HaydockParameters {
  kind: 'haydock';
  x_ocean_converge_spacing?: number;
  x_ocean_converge_thresh?: number;
  x_ocean_niter?: number;
}

export interface GmresParameters {
  kind: 'gmres';
  x_ocean_echamp?: unknown;
  x_ocean_elist?: unknown;
  x_ocean_erange?: unknown;
  x_ocean_estyle?: unknown;
  x_ocean_ffff?: unknown;
  x_ocean_gprc?: unknown;
  x_ocean_nloop?: unknown;
}

/** Exactly one solver block exists, selected by the solver name. */
export type SolverParameters = HaydockParameters | GmresParameters;

export interface BseParameters {
  x_ocean_screen_radius?: number;
  x_ocean_xmesh?: number[];
  solver: SolverParameters;
}

/** Flattened screening keys: scalar keys and `<group>_<key>` entries, all prefixed `x_ocean_`. */
export type ScreenParameters = Record<string, unknown>;

export interface Method {
  photon?: Photon;
  starting_method_ref?: Method;
  k_mesh?: KMesh;
  bse?: BSE;
  x_ocean_bse_parameters?: BseParameters;
  x_ocean_screen_parameters?: ScreenParameters;
  x_ocean_edges?: number[][];
}

export interface Spectra {
  type?: string;
  n_energies: number;
  excitation_energies: number[];
  intensities: number[];
}

export interface LanczosResults {
  x_ocean_n_tridiagonal_matrix: number;
  x_ocean_scaling_factor: number;
  x_ocean_tridiagonal_matrix: [number, number][];
  x_ocean_eigenvalues: number[][];
}

export interface Calculation {
  system_ref?: System;
  method_ref?: Method;
  spectra: Spectra[];
  x_ocean_lanczos_results?: LanczosResults;
}

export interface Run {
  program?: Program;
  system: System[];
  method: Method[];
  calculation: Calculation[];
}

export interface Link {
  name: string;
  section: object;
}

export interface SinglePointWorkflow {
  type: 'single_point';
}

export interface TaskReference {
  task: SinglePointWorkflow;
  inputs: Link[];
  outputs: Link[];
}

export interface PhotonPolarizationResults {
  n_polarizations: number;
  spectrum_polarization: Spectra[];
}

export interface PhotonPolarizationWorkflow {
  type: 'photon_polarization';
  method_ref?: Method;
  inputs: Link[];
  outputs: Link[];
  tasks: TaskReference[];
  results: PhotonPolarizationResults;
}

export type Workflow = SinglePointWorkflow | PhotonPolarizationWorkflow;

export interface EntryArchive {
  run: Run[];
  workflow?: Workflow;
}

// ── Construction primitives ──────────────────────────────────────────────────

export function createArchive(): EntryArchive {
  return { run: [] };
}

export function createRun(archive: EntryArchive): Run {
  const run: Run = { system: [], method: [], calculation: [] };
  archive.run.push(run);
  return run;
}

/** Append `section` to a list field and return it. */
export function appendSection<T>(list: T[], section: T): T {
  list.push(section);
  return section;
}

export function lastOf<T>(list: readonly T[]): T | undefined {
  return list[list.length - 1];
}
