import * as fs from 'fs';
import * as path from 'path';
import { createStderrLogger } from '../shared/index.js';
import { serializeParseResult } from './output.js';
import { parseOceanRun } from './parser.js';

interface ParseArgs {
  mainfile?: string;
  output?: string;
  includeChildren: boolean;
}

function parseArgs(argv: string[]): ParseArgs {
  const out: ParseArgs = { includeChildren: true };
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '--output' || arg === '-o') {
      const value = argv[++index];
      if (value === undefined || value.startsWith('-')) throw new Error(`Missing value for ${arg}`);
      out.output = value;
    }
    else if (arg === '--no-children') out.includeChildren = false;
    else if (arg === '--help' || arg === '-h') throw new Error('help');
    else if (arg !== undefined && arg.startsWith('-')) throw new Error(`Unknown arg: ${arg}`);
    else if (out.mainfile === undefined) out.mainfile = arg;
    else throw new Error(`Unexpected extra argument: ${arg}`);
  }
  return out;
}

function usage(): string {
  return [
    'Usage:',
    '  ocean-mcp parse <path/to/oceanOut.json> [--output result.json] [--no-children]',
    '',
    'Auxiliary files (absspct*, photon*, abslanc*) are read from the main file\'s directory.',
  ].join('\n');
}

function writeFileAtomic(target: string, content: string): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  const tmpPath = `${target}.tmp-${process.pid}`;
  try {
    fs.writeFileSync(tmpPath, content);
    fs.renameSync(tmpPath, target);
  } finally {
    fs.rmSync(tmpPath, { force: true });
  }
}

export async function runParseCli(argv: string[]): Promise<void> {
  let args: ParseArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message === 'help') {
      console.error(usage());
      return;
    }
    throw new Error(`${message}\n${usage()}`);
  }

  if (args.mainfile === undefined) {
    throw new Error(`Missing main file.\n${usage()}`);
  }

  const mainfile = path.resolve(args.mainfile);
  const result = parseOceanRun(mainfile, { logger: createStderrLogger() });
  if (!result) {
    throw new Error(`Cannot load OCEAN main file: ${mainfile}`);
  }

  const serialized = serializeParseResult(result, { includeChildren: args.includeChildren });
  const text = `${JSON.stringify(serialized, null, 2)}\n`;
  if (args.output !== undefined) {
    const output = path.resolve(args.output);
    writeFileAtomic(output, text);
    console.error('[ocean-mcp] Parse complete:', JSON.stringify({ output, n_children: serialized.n_children }));
  } else {
    process.stdout.write(text);
  }
}
