import { describe, it, expect } from 'vitest';
import { parseLanczosFile } from '../ocean/parseLanczos.js';

describe('parseLanczosFile', () => {
  it('consumes exactly n tridiagonal rows and keeps the rest as eigenvalues', () => {
    const data = parseLanczosFile([
      '3 0.75',
      '1.5',
      '2.0 0.3',
      '2.5 0.4',
      '-1.0 0.5',
      '0.2 0.6',
    ].join('\n'));
    expect(data).toEqual({
      dimension: 3,
      scaling_factor: 0.75,
      tridiagonal: [[1.5, 0], [2.0, 0.3], [2.5, 0.4]],
      eigenvalues: [[-1.0, 0.5], [0.2, 0.6]],
    });
  });

  it('forces the first row second column to zero', () => {
    const data = parseLanczosFile('2 1.0\n4.0 9.9\n5.0 0.7\n');
    expect(data?.tridiagonal).toEqual([[4.0, 0.0], [5.0, 0.7]]);
    expect(data?.eigenvalues).toEqual([]);
  });

  it('ignores blank lines between records', () => {
    const data = parseLanczosFile('\n1 2.5\n\n3.0 0.0\n\n7.0\n');
    expect(data).toEqual({
      dimension: 1,
      scaling_factor: 2.5,
      tridiagonal: [[3.0, 0.0]],
      eigenvalues: [[7.0]],
    });
  });

  it('keeps a truncated matrix partial with no eigenvalues', () => {
    const data = parseLanczosFile('4 1.0\n1.0\n2.0 0.1\n');
    expect(data?.dimension).toBe(4);
    expect(data?.tridiagonal).toEqual([[1.0, 0.0], [2.0, 0.1]]);
    expect(data?.eigenvalues).toEqual([]);
  });

  it('truncates at a malformed matrix row instead of shifting later rows up', () => {
    const data = parseLanczosFile('3 0.75\n1.5\n2.0 abc\n2.5 0.4\n-1.0 0.5\n0.2 0.6\n');
    expect(data?.tridiagonal).toEqual([[1.5, 0.0]]);
    expect(data?.eigenvalues).toEqual([]);
  });

  it('skips malformed eigenvalue rows', () => {
    const data = parseLanczosFile('1 1.0\n3.0\n-1.0 0.5\n***\n0.2 0.6\n');
    expect(data?.eigenvalues).toEqual([[-1.0, 0.5], [0.2, 0.6]]);
  });

  it('reads Fortran D exponents', () => {
    const data = parseLanczosFile('2 0.75\n0.15D+01\n2.0 0.3d-1\n-1.0 0.5\n');
    expect(data).toEqual({
      dimension: 2,
      scaling_factor: 0.75,
      tridiagonal: [[1.5, 0.0], [2.0, 0.03]],
      eigenvalues: [[-1.0, 0.5]],
    });
  });

  it('returns null without a usable header', () => {
    expect(parseLanczosFile('n scale\n1.0\n')).toBeNull();
    expect(parseLanczosFile('')).toBeNull();
    expect(parseLanczosFile('5\n1.0 2.0\n')).toBeNull();
    expect(parseLanczosFile('2.5 1.0\n1.0\n')).toBeNull();
  });
});
