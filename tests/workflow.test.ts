import * as fs from 'fs';
import * as path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { buildChildRun } from '../src/ocean/childRun.js';
import { parseOceanRun } from '../src/ocean/parser.js';
import { aggregateWorkflow } from '../src/ocean/workflow.js';
import {
  KEY_01,
  KEY_02,
  MAINFILE_NAME,
  SPECTRA_01,
  SPECTRA_02,
  baseConfig,
  configFrom,
  recordingLogger,
  removeDir,
  standardFiles,
  writeRunDir,
} from './helpers/oceanRun.js';

describe('parseOceanRun', () => {
  let dir = '';

  afterEach(() => {
    if (dir) removeDir(dir);
    dir = '';
  });

  it('builds one child per spectra file in lexical order', () => {
    const key10 = 'absspct_Ti.0001_1s_10';
    dir = writeRunDir({ ...standardFiles(), [key10]: SPECTRA_02 });
    const result = parseOceanRun(path.join(dir, MAINFILE_NAME), { logger: recordingLogger() });

    expect(result?.children.map(c => c.key)).toEqual([KEY_01, KEY_02, key10]);
    const workflow = result?.workflow.workflow;
    expect(workflow?.type).toBe('photon_polarization');
    if (workflow?.type !== 'photon_polarization') return;
    expect(workflow.tasks).toHaveLength(3);
    expect(workflow.results.n_polarizations).toBe(3);
    expect(workflow.outputs.map(link => link.name)).toEqual([
      'Output polarization 1',
      'Output polarization 2',
      'Output polarization 3',
    ]);
  });

  it('links tasks to the child sections by reference', () => {
    dir = writeRunDir(standardFiles());
    const result = parseOceanRun(path.join(dir, MAINFILE_NAME), { logger: recordingLogger() });
    const children = result?.children ?? [];
    const parentRun = result?.workflow.run[0];
    const workflow = result?.workflow.workflow;
    if (workflow?.type !== 'photon_polarization') throw new Error('expected a photon-polarization workflow');

    const firstChildRun = children[0]?.archive.run[0];
    expect(parentRun?.program).toBe(firstChildRun?.program);
    expect(parentRun?.system[0]).toBe(firstChildRun?.system[0]);

    children.forEach((child, i) => {
      const childRun = child.archive.run[0];
      const task = workflow.tasks[i];
      expect(task?.task).toBe(child.archive.workflow);
      expect(task?.inputs.map(link => link.name)).toEqual(['Input structure', 'Input photon parameters']);
      expect(task?.inputs[0]?.section).toBe(childRun?.system[0]);
      expect(task?.inputs[1]?.section).toBe(childRun?.method[0]);
      expect(task?.outputs[0]?.section).toBe(childRun?.calculation[0]);
      expect(workflow.outputs[i]?.section).toBe(childRun?.calculation[0]);
      expect(workflow.results.spectrum_polarization[i]).toBe(childRun?.calculation[0]?.spectra[0]);
    });
  });

  it('owns its BSE method and points the workflow at it', () => {
    dir = writeRunDir(standardFiles());
    const result = parseOceanRun(path.join(dir, MAINFILE_NAME), { logger: recordingLogger() });
    const parentRun = result?.workflow.run[0];
    const workflow = result?.workflow.workflow;
    if (workflow?.type !== 'photon_polarization') throw new Error('expected a photon-polarization workflow');

    const method = parentRun?.method[0];
    expect(parentRun?.method).toHaveLength(1);
    expect(method?.bse?.core_hole.mode).toBe('absorption');
    expect(workflow.method_ref).toBe(method);
    expect(workflow.inputs.map(link => link.name)).toEqual(['Input structure', 'Input BSE methodology']);
    expect(workflow.inputs[1]?.section).toBe(method);

    const childMethod = result?.children[0]?.archive.run[0]?.method[1];
    expect(childMethod).toEqual({ ...method, starting_method_ref: childMethod?.starting_method_ref });
    expect(childMethod).not.toBe(method);
  });

  it('builds a child from a symlinked spectra file', () => {
    dir = writeRunDir({ ...standardFiles(), 'staged-spectra.dat': SPECTRA_01 });
    fs.rmSync(path.join(dir, KEY_01));
    fs.symlinkSync(path.join(dir, 'staged-spectra.dat'), path.join(dir, KEY_01));
    const result = parseOceanRun(path.join(dir, MAINFILE_NAME), { logger: recordingLogger() });

    expect(result?.children.map(c => c.key)).toEqual([KEY_01, KEY_02]);
    expect(result?.children[0]?.archive.run[0]?.calculation[0]?.spectra[0]?.n_energies).toBe(3);
  });

  it('returns null and logs when the main file is not JSON', () => {
    dir = writeRunDir({ ...standardFiles(), [MAINFILE_NAME]: '{ not json' });
    const logger = recordingLogger();
    const result = parseOceanRun(path.join(dir, MAINFILE_NAME), { logger });

    expect(result).toBeNull();
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error.mock.calls[0]?.[0]).toBe('Error opening json output file.');
  });

  it('returns null when the main file is missing', () => {
    dir = writeRunDir({});
    const logger = recordingLogger();
    expect(parseOceanRun(path.join(dir, MAINFILE_NAME), { logger })).toBeNull();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('keeps parsing when a structure value is null', () => {
    const raw = baseConfig();
    dir = writeRunDir({
      ...standardFiles(),
      [MAINFILE_NAME]: JSON.stringify({ ...raw, structure: { ...raw.structure, epsilon: null } }),
    });
    const logger = recordingLogger();
    const result = parseOceanRun(path.join(dir, MAINFILE_NAME), { logger });

    expect(result?.children).toHaveLength(2);
    expect(result?.workflow.run[0]?.method[0]?.bse?.dielectric_infinity).toBeUndefined();
    expect(result?.workflow.run[0]?.method[0]?.bse?.core_hole.edge).toBe('K');
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('leaves positions unset when xangst is malformed', () => {
    const raw = baseConfig();
    dir = writeRunDir({
      ...standardFiles(),
      [MAINFILE_NAME]: JSON.stringify({ ...raw, structure: { ...raw.structure, xangst: [[0, 0, 'x']] } }),
    });
    const result = parseOceanRun(path.join(dir, MAINFILE_NAME), { logger: recordingLogger() });
    const atoms = result?.children[0]?.archive.run[0]?.system[0]?.atoms;

    expect(result?.children).toHaveLength(2);
    expect(atoms?.positions).toBeUndefined();
    expect(atoms?.labels).toEqual(['Ti', 'O', 'O']);
  });

  it('treats a malformed structure section as missing structure', () => {
    dir = writeRunDir({ ...standardFiles(), [MAINFILE_NAME]: JSON.stringify({ ...baseConfig(), structure: 'none' }) });
    const logger = recordingLogger();
    const result = parseOceanRun(path.join(dir, MAINFILE_NAME), { logger });
    const workflow = result?.workflow.workflow;
    if (workflow?.type !== 'photon_polarization') throw new Error('expected a photon-polarization workflow');

    expect(result?.children).toHaveLength(2);
    expect(result?.children[0]?.archive.workflow).toBeUndefined();
    expect(workflow.tasks).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith(
      'Error finding the structure in the main output file.',
      { key: KEY_01 },
    );
  });

  it('keeps going after a mapping error', () => {
    const raw = baseConfig();
    raw.bse.core.solver = 'bicg';
    dir = writeRunDir({ ...standardFiles(), [MAINFILE_NAME]: JSON.stringify(raw) });
    const logger = recordingLogger();
    const result = parseOceanRun(path.join(dir, MAINFILE_NAME), { logger });
    const workflow = result?.workflow.workflow;
    if (workflow?.type !== 'photon_polarization') throw new Error('expected a photon-polarization workflow');

    expect(result?.children).toHaveLength(2);
    expect(result?.workflow.run[0]?.method).toEqual([]);
    expect(workflow.method_ref).toBeUndefined();
    expect(workflow.inputs.map(link => link.name)).toEqual(['Input structure']);
    expect(workflow.tasks).toHaveLength(2);
    // Two children and the workflow each report the failure.
    expect(logger.error).toHaveBeenCalledTimes(3);
  });

  it('produces an empty workflow for a directory without spectra', () => {
    dir = writeRunDir({ [MAINFILE_NAME]: JSON.stringify(baseConfig()) });
    const logger = recordingLogger();
    const result = parseOceanRun(path.join(dir, MAINFILE_NAME), { logger });
    const workflow = result?.workflow.workflow;
    if (workflow?.type !== 'photon_polarization') throw new Error('expected a photon-polarization workflow');

    expect(result?.children).toEqual([]);
    expect(result?.workflow.run[0]?.program).toEqual({});
    expect(result?.workflow.run[0]?.system).toEqual([{}]);
    expect(result?.workflow.run[0]?.method).toHaveLength(1);
    expect(workflow.tasks).toEqual([]);
    expect(workflow.results).toEqual({ n_polarizations: 0, spectrum_polarization: [] });
    expect(logger.warn).toHaveBeenCalledWith(
      'Cannot resolve program and system from the first photon archive. Generating empty sections.',
    );
  });
});

describe('aggregateWorkflow', () => {
  let dir = '';

  afterEach(() => {
    if (dir) removeDir(dir);
    dir = '';
  });

  it('skips incomplete children', () => {
    dir = writeRunDir(standardFiles());
    const logger = recordingLogger();
    const raw: Record<string, unknown> = { ...baseConfig() };
    delete raw.structure;
    const incomplete = buildChildRun(KEY_01, configFrom(raw), dir, logger);
    const complete = buildChildRun(KEY_02, configFrom(baseConfig()), dir, logger);
    if (!incomplete || !complete) throw new Error('expected both children');

    const archive = aggregateWorkflow([incomplete, complete], configFrom(baseConfig()), logger);
    const workflow = archive.workflow;
    if (workflow?.type !== 'photon_polarization') throw new Error('expected a photon-polarization workflow');

    expect(archive.run[0]?.program).toBe(complete.archive.run[0]?.program);
    expect(workflow.tasks).toHaveLength(1);
    expect(workflow.tasks[0]?.task).toBe(complete.archive.workflow);
    expect(workflow.outputs[0]?.name).toBe('Output polarization 1');
  });
});
