import { describe, expect, it } from 'vitest';
import { chemicalSymbol, resolveAtomLabels } from '../src/ocean/elements.js';
import { convert, convertMatrix } from '../src/ocean/units.js';
import { BOHR_M, EV_J } from './helpers/oceanRun.js';

describe('convert', () => {
  it('converts to SI', () => {
    expect(convert(2, 'bohr', 'meter')).toBe(2 * BOHR_M);
    expect(convert(3, 'eV', 'joule')).toBe(3 * EV_J);
    expect(convert(1, 'angstrom', 'meter')).toBe(1e-10);
  });

  it('inverts the factor for reciprocal lengths', () => {
    expect(convert(1, '1/bohr', '1/meter')).toBe(1 / BOHR_M);
  });

  it('returns the value unchanged for identical units', () => {
    expect(convert(0.1, 'rydberg', 'rydberg')).toBe(0.1);
  });

  it('refuses to cross dimensions', () => {
    expect(() => convert(1, 'eV', 'meter')).toThrow('Cannot convert eV to meter');
  });

  it('converts every row of a matrix', () => {
    expect(convertMatrix([[1, 0], [0, 2]], 'bohr', 'meter')).toEqual([[BOHR_M, 0], [0, 2 * BOHR_M]]);
  });
});

describe('chemicalSymbol', () => {
  it('looks symbols up by atomic number', () => {
    expect(chemicalSymbol(0)).toBe('X');
    expect(chemicalSymbol(1)).toBe('H');
    expect(chemicalSymbol(22)).toBe('Ti');
    expect(chemicalSymbol(118)).toBe('Og');
  });

  it('has no symbol beyond the table or for non-integers', () => {
    expect(chemicalSymbol(119)).toBeUndefined();
    expect(chemicalSymbol(-1)).toBeUndefined();
    expect(chemicalSymbol(1.5)).toBeUndefined();
  });
});

describe('resolveAtomLabels', () => {
  it('maps 1-based species indices through znucl', () => {
    expect(resolveAtomLabels([22, 8], [1, 2, 2])).toEqual(['Ti', 'O', 'O']);
  });

  it('truncates fractional atomic numbers', () => {
    expect(resolveAtomLabels([8.0001], [1])).toEqual(['O']);
  });

  it('gives up when a species index is out of range', () => {
    expect(resolveAtomLabels([22], [1, 2])).toBeUndefined();
    expect(resolveAtomLabels([22], [0])).toBeUndefined();
  });
});
