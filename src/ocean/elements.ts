import * as fs from 'fs';

/** Index = atomic number; index 0 is the dummy symbol "X". */
const CHEMICAL_SYMBOLS: readonly string[] = loadSymbols();

function loadSymbols(): string[] {
  const raw = fs.readFileSync(new URL('../data/chemical_symbols.json', import.meta.url), 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed) || !parsed.every((s): s is string => typeof s === 'string')) {
    throw new Error('chemical_symbols.json must be an array of strings');
  }
  return parsed;
}

export function chemicalSymbol(atomicNumber: number): string | undefined {
  if (!Number.isInteger(atomicNumber) || atomicNumber < 0) return undefined;
  return CHEMICAL_SYMBOLS[atomicNumber];
}

/**
 * Site labels from per-species atomic numbers and 1-based per-site species
 * indices. Undefined when any index or atomic number cannot be resolved.
 */
export function resolveAtomLabels(znucl: readonly number[], typat: readonly number[]): string[] | undefined {
  const labels: string[] = [];
  for (const speciesIndex of typat) {
    const z = znucl[speciesIndex - 1];
    const symbol = z === undefined ? undefined : chemicalSymbol(Math.trunc(z));
    if (symbol === undefined) return undefined;
    labels.push(symbol);
  }
  return labels;
}
