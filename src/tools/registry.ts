import * as path from 'path';
import { z } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import {
  createCollectingLogger,
  createStderrLogger,
  LOG_LEVEL_ENV,
  MAINFILE_ENV,
  notFound,
  resolveMainfile,
  upstreamError,
  type LogEntry,
} from '../shared/index.js';
import {
  LANCZOS_PREFIX,
  LANCZOS_TAG_WIDTH,
  PHOTON_PREFIX,
  PHOTON_TAG_WIDTH,
  SPECTRA_PREFIX,
  describePolarizations,
} from '../ocean/discovery.js';
import { parseOceanRun, type OceanParseResult } from '../ocean/parser.js';
import { serializeChildRun, serializeParseResult } from '../ocean/output.js';
import {
  OCEAN_GET_CHILD_RUN,
  OCEAN_INFO,
  OCEAN_LIST_POLARIZATIONS,
  OCEAN_PARSE_RUN,
  SERVER_NAME,
  SERVER_VERSION,
} from '../constants.js';

export type ToolExposureMode = 'standard' | 'full';
export type ToolExposure = 'standard' | 'full';

export const TOOL_MODE_ENV = 'OCEAN_TOOL_MODE';

export interface ToolHandlerContext {}

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  // Method syntax: a spec for a concrete schema must still fit ToolSpec<z.ZodType>.
  handler(params: z.output<TSchema>, ctx: ToolHandlerContext): Promise<unknown>;
}

function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): ToolSpec<TSchema> {
  return spec;
}

export function isToolExposed(spec: ToolSpec, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

export function toolModeFromEnv(): ToolExposureMode {
  return process.env[TOOL_MODE_ENV] === 'full' ? 'full' : 'standard';
}

function runParser(mainfile: string): { result: OceanParseResult; diagnostics: LogEntry[] } {
  const { logger, entries } = createCollectingLogger(createStderrLogger());
  const result = parseOceanRun(mainfile, { logger });
  if (!result) {
    throw upstreamError(`Cannot load OCEAN main file: ${mainfile}`, { mainfile, diagnostics: entries });
  }
  return { result, diagnostics: entries };
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const mainfileParam = z.string().min(1).optional()
  .describe(`Absolute path to the OCEAN main JSON file (default: $${MAINFILE_ENV})`);

const OceanInfoSchema = z.object({});

const OceanListPolarizationsSchema = z.object({
  mainfile: mainfileParam,
});

const OceanParseRunSchema = z.object({
  mainfile: mainfileParam,
  include_children: z.boolean().optional().default(true)
    .describe('Include every per-polarization entry next to the workflow entry'),
});

const OceanGetChildRunSchema = z.object({
  mainfile: mainfileParam,
  key: z.string().min(1).describe('Spectra file name identifying the polarization (e.g. "absspct_Ti.0001_1s_01")'),
});

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: OCEAN_INFO,
    description: 'Return server metadata: version, recognized auxiliary file roles, environment settings.',
    exposure: 'standard',
    zodSchema: OceanInfoSchema,
    handler: async () => ({
      name: SERVER_NAME,
      version: SERVER_VERSION,
      file_roles: {
        spectra: { prefix: SPECTRA_PREFIX, required: true },
        photon: { prefix: PHOTON_PREFIX, tag_width: PHOTON_TAG_WIDTH, required: false },
        lanczos: { prefix: LANCZOS_PREFIX, tag_width: LANCZOS_TAG_WIDTH, required: false },
      },
      env: {
        [MAINFILE_ENV]: process.env[MAINFILE_ENV] ?? null,
        [TOOL_MODE_ENV]: toolModeFromEnv(),
        [LOG_LEVEL_ENV]: process.env[LOG_LEVEL_ENV] ?? null,
      },
    }),
  }),
  defineTool({
    name: OCEAN_LIST_POLARIZATIONS,
    description: 'List the polarization keys found next to an OCEAN main file, with the photon and lanczos files matched to each.',
    exposure: 'standard',
    zodSchema: OceanListPolarizationsSchema,
    handler: async (params) => {
      const mainfile = resolveMainfile(params.mainfile);
      const polarizations = describePolarizations(path.dirname(mainfile));
      return { mainfile, n_polarizations: polarizations.length, polarizations };
    },
  }),
  defineTool({
    name: OCEAN_PARSE_RUN,
    description: 'Parse an OCEAN run into per-polarization entries and one photon-polarization workflow entry. Shared sections appear once; other occurrences are {"$ref": "#/..."} pointers.',
    exposure: 'standard',
    zodSchema: OceanParseRunSchema,
    handler: async (params) => {
      const mainfile = resolveMainfile(params.mainfile);
      const { result, diagnostics } = runParser(mainfile);
      return {
        ...serializeParseResult(result, { includeChildren: params.include_children }),
        diagnostics,
      };
    },
  }),
  defineTool({
    name: OCEAN_GET_CHILD_RUN,
    description: 'Parse an OCEAN run and return the entry of a single polarization key.',
    exposure: 'full',
    zodSchema: OceanGetChildRunSchema,
    handler: async (params) => {
      const mainfile = resolveMainfile(params.mainfile);
      const { result, diagnostics } = runParser(mainfile);
      const child = result.children.find(c => c.key === params.key);
      if (!child) {
        throw notFound(`No polarization entry for key ${params.key}`, {
          available: result.children.map(c => c.key),
        });
      }
      return { key: child.key, entry: serializeChildRun(child), diagnostics };
    },
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}
