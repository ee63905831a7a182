/**
 * Unit conversion for the quantities the result graph stores.
 * Factors are to SI; reciprocal units invert the factor.
 */

export type LengthUnit = 'meter' | 'bohr' | 'angstrom';
export type ReciprocalLengthUnit = '1/meter' | '1/bohr' | '1/angstrom';
export type EnergyUnit = 'joule' | 'eV' | 'hartree' | 'rydberg';
export type Unit = LengthUnit | ReciprocalLengthUnit | EnergyUnit;

const BOHR_M = 5.29177210903e-11;
const ANGSTROM_M = 1e-10;
const EV_J = 1.602176634e-19;
const HARTREE_J = 4.3597447222071e-18;

const DIMENSION: Record<Unit, 'length' | 'reciprocal_length' | 'energy'> = {
  meter: 'length',
  bohr: 'length',
  angstrom: 'length',
  '1/meter': 'reciprocal_length',
  '1/bohr': 'reciprocal_length',
  '1/angstrom': 'reciprocal_length',
  joule: 'energy',
  eV: 'energy',
  hartree: 'energy',
  rydberg: 'energy',
};

const TO_SI: Record<Unit, number> = {
  meter: 1,
  bohr: BOHR_M,
  angstrom: ANGSTROM_M,
  '1/meter': 1,
  '1/bohr': 1 / BOHR_M,
  '1/angstrom': 1 / ANGSTROM_M,
  joule: 1,
  eV: EV_J,
  hartree: HARTREE_J,
  rydberg: HARTREE_J / 2,
};

export function convert(value: number, from: Unit, to: Unit): number {
  if (DIMENSION[from] !== DIMENSION[to]) {
    throw new Error(`Cannot convert ${from} to ${to}`);
  }
  if (from === to) return value;
  return (value * TO_SI[from]) / TO_SI[to];
}

export function convertArray(values: readonly number[], from: Unit, to: Unit): number[] {
  return values.map(v => convert(v, from, to));
}

export function convertMatrix(rows: readonly (readonly number[])[], from: Unit, to: Unit): number[][] {
  return rows.map(row => convertArray(row, from, to));
}
