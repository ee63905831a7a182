/**
 * OCEAN abslanc file parser.
 *
 * Record 0 holds the tridiagonal dimension n and the scaling factor. The
 * next n records are the (a_i, b_i) rows of the tridiagonal matrix; b_0 is
 * zero by convention whatever the file says. Everything after that is
 * eigenvalue rows. A malformed matrix row truncates the matrix.
 */

export interface LanczosData {
  dimension: number;
  scaling_factor: number;
  tridiagonal: [number, number][];
  eigenvalues: number[][];
}

// Fortran writes double-precision exponents as 0.15D+01.
const FORTRAN_EXPONENT_RE = /([\d.])[dD]([-+]?\d)/g;

function parseRecord(line: string): number[] | null {
  const values = line.trim().replace(FORTRAN_EXPONENT_RE, '$1e$2').split(/\s+/).map(Number);
  return values.every(Number.isFinite) ? values : null;
}

export function parseLanczosFile(content: string): LanczosData | null {
  // Malformed lines stay in place as null so that later rows keep their position.
  const records: (number[] | null)[] = [];
  for (const line of content.split(/\r?\n/)) {
    if (line.trim().length === 0) continue;
    records.push(parseRecord(line));
  }

  const [header, ...rest] = records;
  if (!header) return null;
  const [dimension, scaling] = header;
  if (dimension === undefined || scaling === undefined) return null;
  if (!Number.isInteger(dimension) || dimension < 0) return null;

  const tridiagonal: [number, number][] = [];
  let consumed = 0;
  for (const record of rest.slice(0, dimension)) {
    if (!record) break;
    const [a, b] = record;
    if (a === undefined) break;
    if (consumed === 0) {
      tridiagonal.push([a, 0.0]);
    } else {
      if (b === undefined) break;
      tridiagonal.push([a, b]);
    }
    consumed += 1;
  }

  // A truncated matrix leaves nothing that can be read as eigenvalues.
  const eigenvalues = consumed === dimension
    ? rest.slice(dimension).filter((record): record is number[] => record !== null)
    : [];

  return {
    dimension,
    scaling_factor: scaling,
    tridiagonal,
    eigenvalues,
  };
}
