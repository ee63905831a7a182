/**
 * OCEAN absspct table parser.
 *
 * Whitespace-delimited columns: energy (eV), reserved, intensity, ...
 * Lines starting with '#' are comments.
 */

export interface SpectraTable {
  energies: number[];
  intensities: number[];
}

const ENERGY_COLUMN = 0;
const INTENSITY_COLUMN = 2;

export function parseSpectraFile(content: string): SpectraTable {
  const energies: number[] = [];
  const intensities: number[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) continue;

    const fields = line.split(/\s+/).map(Number);
    const energy = fields[ENERGY_COLUMN];
    const intensity = fields[INTENSITY_COLUMN];
    if (energy === undefined || intensity === undefined) continue;
    if (!Number.isFinite(energy) || !Number.isFinite(intensity)) continue;

    energies.push(energy);
    intensities.push(intensity);
  }

  return { energies, intensities };
}
