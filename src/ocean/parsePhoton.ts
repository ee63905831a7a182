/**
 * OCEAN photonN file parser.
 *
 * Layout:
 *   quad                 ← operator: dipole | quad | NRIXS
 *   cartesian 1 0 0      ← polarization
 *   end
 *   cartesian 0 1 0      ← momentum transfer (quad / NRIXS only)
 *   end
 *   4966                 ← photon energy (eV)
 */

import type { Photon, Vector3 } from '../archive/sections.js';
import { convert } from './units.js';

export type PhotonOperator = 'dipole' | 'quad' | 'NRIXS';

export interface PhotonFileData {
  operator: PhotonOperator | null;
  vectors: Vector3[];
  energy_eV: number | null;
}

/** Operators whose second vector is a momentum transfer. */
const MOMENTUM_TRANSFER_OPERATORS: ReadonlySet<string> = new Set(['quad', 'NRIXS']);

const OPERATOR_RE = /^(dipole|quad|NRIXS)\b/m;
const VECTOR_RE = /cartesian([-\s\d.]+)/g;
const ENERGY_RE = /^end[ \t]*\r?\n[ \t]*(-?\d+(?:\.\d*)?(?:[eE][-+]?\d+)?)/m;

function isOperator(value: string): value is PhotonOperator {
  return value === 'dipole' || value === 'quad' || value === 'NRIXS';
}

function parseVector(raw: string): Vector3 | null {
  const values = raw.trim().split(/\s+/).filter(s => s.length > 0).map(Number);
  const [x, y, z] = values;
  if (x === undefined || y === undefined || z === undefined) return null;
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) return null;
  return [x, y, z];
}

export function parsePhotonFile(content: string): PhotonFileData {
  const operatorMatch = OPERATOR_RE.exec(content);
  const operatorText = operatorMatch?.[1];
  const operator = operatorText !== undefined && isOperator(operatorText) ? operatorText : null;

  const vectors: Vector3[] = [];
  for (const match of content.matchAll(VECTOR_RE)) {
    const vector = parseVector(match[1] ?? '');
    if (vector) vectors.push(vector);
  }

  const energyText = ENERGY_RE.exec(content)?.[1];
  const energy = energyText === undefined ? NaN : Number(energyText);

  return {
    operator,
    vectors,
    energy_eV: Number.isFinite(energy) ? energy : null,
  };
}

/** Photon section; fields the file does not provide stay unset. */
export function photonFromFile(data: PhotonFileData): Photon {
  const photon: Photon = {};
  if (data.operator !== null) photon.multipole_type = data.operator;

  const [polarization, second] = data.vectors;
  if (polarization) photon.polarization = polarization;
  if (data.operator !== null && MOMENTUM_TRANSFER_OPERATORS.has(data.operator) && second) {
    photon.momentum_transfer = second;
  }

  if (data.energy_eV !== null) photon.energy = convert(data.energy_eV, 'eV', 'joule');
  return photon;
}
