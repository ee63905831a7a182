/**
 * OCEAN configuration → BSE method section.
 *
 * Pure: the same configuration always yields an equal (but never shared)
 * method section. Values outside the controlled vocabularies throw a
 * MAPPING_ERROR naming the offending field.
 */

import type {
  BSE,
  CoreHole,
  CoreHoleMode,
  CoreHoleSolver,
  CoreLevelEdge,
  Method,
  ScreenParameters,
  SolverParameters,
} from '../archive/sections.js';
import { mappingError } from '../shared/index.js';
import type { OceanConfig, OceanScreen } from './config.js';
import { convert } from './units.js';

const SOLVER_NAMES: Record<string, CoreHoleSolver> = {
  haydock: 'lanczos-haydock',
  gmres: 'gmres',
};

/** Indexed by bse.core.strength. */
const CORE_HOLE_MODES: readonly CoreHoleMode[] = ['emission', 'absorption'];

/** Trailing [n, l] of an edge → core level. */
const CORE_LEVEL_EDGES: Record<string, CoreLevelEdge> = {
  '1,0': 'K',
  '2,1': 'L23',
};

const SCREEN_KEYS = [
  'all_augment',
  'augment',
  'convertstyle',
  'dft_energy_range',
  'inversionstyle',
  'kshift',
  'mimic_exciting_bands',
  'shells',
] as const;

const SCREEN_GROUPS = ['core_offset', 'final', 'grid'] as const;

type CoreConfig = NonNullable<NonNullable<OceanConfig['bse']>['core']>;

function copy<T>(value: T): T {
  return structuredClone(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number';
}

function parseEdge(raw: unknown): number[] | null {
  let values: number[];
  if (typeof raw === 'string') {
    values = raw.trim().split(/\s+/).filter(s => s.length > 0).map(Number);
  } else if (Array.isArray(raw) && raw.every(isNumber)) {
    values = [...raw];
  } else {
    return null;
  }
  if (values.length < 2 || !values.every(Number.isInteger)) return null;
  return values;
}

/** `calc.edges` as integer rows ("22 1 0" → [22, 1, 0]). */
export function parseEdges(raw: readonly unknown[] | undefined): number[][] {
  if (raw === undefined || raw.length === 0) {
    throw mappingError('calc.edges', raw ?? null, 'calc.edges must list at least one edge');
  }
  return raw.map((entry, index) => {
    const edge = parseEdge(entry);
    if (!edge) throw mappingError(`calc.edges[${index}]`, entry, `Malformed edge: ${JSON.stringify(entry)}`);
    return edge;
  });
}

export function edgeLabel(edge: readonly number[]): CoreLevelEdge {
  const nl = edge.slice(-2);
  const label = CORE_LEVEL_EDGES[nl.join(',')];
  if (label === undefined) {
    throw mappingError('calc.edges[0]', nl, `No core level for edge [n, l] = [${nl.join(', ')}]`);
  }
  return label;
}

export function coreHoleSolver(name: string | undefined): CoreHoleSolver {
  const solver = name === undefined ? undefined : SOLVER_NAMES[name];
  if (solver === undefined) {
    throw mappingError('bse.core.solver', name ?? null, `Unknown core-hole solver: ${name ?? '(missing)'}`);
  }
  return solver;
}

export function coreHoleMode(strength: number | undefined): CoreHoleMode {
  const mode = strength !== undefined && Number.isInteger(strength) ? CORE_HOLE_MODES[strength] : undefined;
  if (mode === undefined) {
    throw mappingError('bse.core.strength', strength ?? null, `Core-hole strength must be 0 or 1, got ${strength ?? '(missing)'}`);
  }
  return mode;
}

export function solverParameters(solver: CoreHoleSolver, core: CoreConfig | undefined): SolverParameters {
  if (solver === 'lanczos-haydock') {
    const haydock = core?.haydock;
    return {
      kind: 'haydock',
      x_ocean_converge_spacing: haydock?.converge?.spacing,
      x_ocean_converge_thresh: haydock?.converge?.thresh,
      x_ocean_niter: haydock?.niter,
    };
  }
  const gmres: Record<string, unknown> = core?.gmres ?? {};
  return {
    kind: 'gmres',
    x_ocean_echamp: copy(gmres.echamp),
    x_ocean_elist: copy(gmres.elist),
    x_ocean_erange: copy(gmres.erange),
    x_ocean_estyle: copy(gmres.estyle),
    x_ocean_ffff: copy(gmres.ffff),
    x_ocean_gprc: copy(gmres.gprc),
    x_ocean_nloop: copy(gmres.nloop),
  };
}

export function screenParameters(screen: OceanScreen | undefined): ScreenParameters {
  const params: ScreenParameters = {};
  if (!screen) return params;
  for (const key of SCREEN_KEYS) {
    if (screen[key] !== undefined) params[`x_ocean_${key}`] = copy(screen[key]);
  }
  for (const group of SCREEN_GROUPS) {
    const entries = screen[group];
    if (!entries) continue;
    for (const [subkey, value] of Object.entries(entries)) {
      params[`x_ocean_${group}_${subkey}`] = copy(value);
    }
  }
  if (screen.model?.flavor !== undefined) params.x_ocean_model_flavor = screen.model.flavor;
  return params;
}

export function mapMethod(config: OceanConfig): Method {
  const bseConfig = config.bse;
  const core = bseConfig?.core;
  const screen = config.screen;

  const edges = parseEdges(config.calc?.edges);
  const [firstEdge] = edges;
  if (!firstEdge) throw mappingError('calc.edges', [], 'calc.edges must list at least one edge');

  const solver = coreHoleSolver(core?.solver);
  const coreHole: CoreHole = {
    mode: coreHoleMode(core?.strength),
    solver,
    edge: edgeLabel(firstEdge),
  };
  if (core?.broaden !== undefined) coreHole.broadening = convert(core.broaden, 'eV', 'joule');

  const bse: BSE = {
    type: solver,
    n_empty_states: bseConfig?.nbands,
    screening_type: screen?.mode,
    dielectric_infinity: config.structure?.epsilon,
    n_empty_states_screening: screen?.nbands,
    k_mesh_screening: { grid: screen?.kmesh && copy(screen.kmesh) },
    core_hole: coreHole,
  };

  return {
    k_mesh: { grid: bseConfig?.kmesh && copy(bseConfig.kmesh) },
    bse,
    x_ocean_bse_parameters: {
      x_ocean_screen_radius: core?.screen_radius,
      x_ocean_xmesh: bseConfig?.xmesh && copy(bseConfig.xmesh),
      solver: solverParameters(solver, core),
    },
    x_ocean_screen_parameters: screenParameters(screen),
    x_ocean_edges: edges,
  };
}
