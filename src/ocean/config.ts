/**
 * Main OCEAN JSON document.
 *
 * Every section is optional and unknown keys pass through: the parser only
 * needs the keys below, and the file carries many more.
 */

import * as fs from 'fs';
import { z } from 'zod';

/**
 * Optional field that reads as absent when null or off-type, so one bad
 * value never rejects the whole document.
 */
function lenient<T extends z.ZodType>(schema: T) {
  return schema.optional().catch(undefined);
}

const NumberList = z.array(z.number());
const NumberMatrix = z.array(z.array(z.number()));
const NamedGroup = z.record(z.string(), z.unknown());

const VersionSchema = z.looseObject({
  '.': lenient(z.union([z.string(), z.number()]).transform(v => String(v))),
  hash: lenient(z.string()),
});

const DftSchema = z.looseObject({
  program: lenient(z.string()),
});

const StructureSchema = z.looseObject({
  avecs: lenient(NumberMatrix),
  bvecs: lenient(NumberMatrix),
  znucl: lenient(NumberList),
  typat: lenient(z.array(z.number().int())),
  xangst: lenient(NumberMatrix),
  epsilon: lenient(z.number()),
});

const HaydockSchema = z.looseObject({
  converge: lenient(z.looseObject({
    spacing: lenient(z.number()),
    thresh: lenient(z.number()),
  })),
  niter: lenient(z.number()),
});

const CoreSchema = z.looseObject({
  strength: lenient(z.number()),
  solver: lenient(z.string()),
  broaden: lenient(z.number()),
  screen_radius: lenient(z.number()),
  haydock: lenient(HaydockSchema),
  gmres: lenient(NamedGroup),
});

const BseSchema = z.looseObject({
  nbands: lenient(z.number().int()),
  kmesh: lenient(NumberList),
  xmesh: lenient(NumberList),
  core: lenient(CoreSchema),
});

const ScreenSchema = z.looseObject({
  mode: lenient(z.string()),
  nbands: lenient(z.number().int()),
  kmesh: lenient(NumberList),
  core_offset: lenient(NamedGroup),
  final: lenient(NamedGroup),
  grid: lenient(NamedGroup),
  model: lenient(z.looseObject({ flavor: lenient(z.string()) })),
});

const CalcSchema = z.looseObject({
  mode: lenient(z.string()),
  // Entries are checked one by one by the method mapper.
  edges: lenient(z.array(z.unknown())),
});

/** Only a non-object root is rejected; every section reads as absent when malformed. */
export const OceanConfigSchema = z.looseObject({
  version: lenient(VersionSchema),
  dft: lenient(DftSchema),
  structure: lenient(StructureSchema),
  bse: lenient(BseSchema),
  screen: lenient(ScreenSchema),
  calc: lenient(CalcSchema),
});

export type OceanConfig = z.output<typeof OceanConfigSchema>;
export type OceanStructure = z.output<typeof StructureSchema>;
export type OceanScreen = z.output<typeof ScreenSchema>;

export type ConfigLoadResult =
  | { ok: true; config: OceanConfig }
  | { ok: false; reason: string; issues?: unknown };

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function parseOceanConfig(content: string): ConfigLoadResult {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
  const parsed = OceanConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: 'Main file does not match the expected layout', issues: parsed.error.issues };
  }
  return { ok: true, config: deepFreeze(parsed.data) };
}

export function loadOceanConfig(mainfile: string): ConfigLoadResult {
  let content: string;
  try {
    content = fs.readFileSync(mainfile, 'utf-8');
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
  return parseOceanConfig(content);
}
