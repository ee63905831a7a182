import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runParseCli } from '../src/ocean/cli.js';
import { KEY_01, MAINFILE_NAME, removeDir, standardFiles, writeRunDir } from './helpers/oceanRun.js';

describe('runParseCli', () => {
  let dir = '';

  beforeEach(() => {
    dir = writeRunDir(standardFiles());
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    removeDir(dir);
    vi.restoreAllMocks();
  });

  it('writes the serialized run to --output', async () => {
    const output = path.join(dir, 'out', 'result.json');
    await runParseCli([path.join(dir, MAINFILE_NAME), '--output', output]);

    const written: unknown = JSON.parse(fs.readFileSync(output, 'utf-8'));
    expect(written).toMatchObject({
      n_children: 2,
      workflow: { workflow: { type: 'photon_polarization' } },
    });
    expect(written).toHaveProperty(['children', KEY_01, 'workflow', 'type'], 'single_point');
    expect(fs.readdirSync(path.dirname(output))).toEqual(['result.json']);
  });

  it('leaves children out with --no-children', async () => {
    const output = path.join(dir, 'result.json');
    await runParseCli([path.join(dir, MAINFILE_NAME), '--no-children', '-o', output]);
    const written: unknown = JSON.parse(fs.readFileSync(output, 'utf-8'));
    expect(written).not.toHaveProperty('children');
  });

  it('requires a main file', async () => {
    await expect(runParseCli([])).rejects.toThrow('Missing main file.');
  });

  it('requires a value after --output', async () => {
    const mainfile = path.join(dir, MAINFILE_NAME);
    await expect(runParseCli([mainfile, '--output'])).rejects.toThrow('Missing value for --output');
    await expect(runParseCli([mainfile, '-o', '--no-children'])).rejects.toThrow('Missing value for -o');
  });

  it('rejects unknown flags', async () => {
    await expect(runParseCli(['--verbose'])).rejects.toThrow('Unknown arg: --verbose');
  });

  it('fails when the main file cannot be loaded', async () => {
    const missing = path.join(dir, 'absent.json');
    await expect(runParseCli([missing])).rejects.toThrow(`Cannot load OCEAN main file: ${missing}`);
  });
});
