/**
 * Photon-polarization workflow: one parent entry that links every child
 * entry as a task.
 *
 * Program and system are taken by reference from the first complete child
 * (first-wins policy). The BSE method is mapped again from the
 * configuration and owned by the parent.
 */

import {
  appendSection,
  createArchive,
  createRun,
  lastOf,
  type EntryArchive,
  type Link,
  type Method,
  type PhotonPolarizationWorkflow,
  type Spectra,
  type TaskReference,
} from '../archive/sections.js';
import { isMappingError, type Logger } from '../shared/index.js';
import { isCompleteChild, type ChildRun } from './childRun.js';
import type { OceanConfig } from './config.js';
import { mapMethod } from './methodMapper.js';

function mapWorkflowMethod(config: OceanConfig, logger: Logger): Method | undefined {
  try {
    return mapMethod(config);
  } catch (err) {
    if (!isMappingError(err)) throw err;
    logger.error(`Cannot map BSE method for the polarization workflow: ${err.message}`, {
      code: err.code,
      data: err.data,
    });
    return undefined;
  }
}

function buildTask(child: ChildRun, position: number): { task: TaskReference; spectra?: Spectra } | null {
  const run = lastOf(child.archive.run);
  const workflow = child.archive.workflow;
  if (!run || workflow?.type !== 'single_point') return null;

  const system = lastOf(run.system);
  const photonMethod = run.method[0];
  const calculation = lastOf(run.calculation);

  const inputs: Link[] = [];
  if (system && photonMethod) {
    inputs.push({ name: 'Input structure', section: system });
    inputs.push({ name: 'Input photon parameters', section: photonMethod });
  }
  const outputs: Link[] = calculation
    ? [{ name: `Output polarization ${position}`, section: calculation }]
    : [];

  return {
    task: { task: workflow, inputs, outputs },
    spectra: calculation?.spectra[0],
  };
}

export function aggregateWorkflow(
  children: readonly ChildRun[],
  config: OceanConfig,
  logger: Logger,
): EntryArchive {
  const archive = createArchive();
  const run = createRun(archive);

  const complete = children.filter(isCompleteChild);
  const firstRun = complete[0] ? lastOf(complete[0].archive.run) : undefined;
  const firstSystem = firstRun ? lastOf(firstRun.system) : undefined;

  if (firstRun?.program && firstSystem) {
    run.program = firstRun.program;
    appendSection(run.system, firstSystem);
  } else {
    logger.warn('Cannot resolve program and system from the first photon archive. Generating empty sections.');
    run.program = {};
    appendSection(run.system, {});
  }

  const method = mapWorkflowMethod(config, logger);
  if (method) appendSection(run.method, method);

  const inputStructure = lastOf(run.system);
  const workflow: PhotonPolarizationWorkflow = {
    type: 'photon_polarization',
    method_ref: method,
    inputs: [],
    outputs: [],
    tasks: [],
    results: { n_polarizations: 0, spectrum_polarization: [] },
  };
  if (inputStructure) workflow.inputs.push({ name: 'Input structure', section: inputStructure });
  if (method) workflow.inputs.push({ name: 'Input BSE methodology', section: method });

  for (const child of complete) {
    const built = buildTask(child, workflow.tasks.length + 1);
    if (!built) continue;
    workflow.tasks.push(built.task);
    workflow.outputs.push(...built.task.outputs.map(link => ({ ...link })));
    if (built.spectra) workflow.results.spectrum_polarization.push(built.spectra);
  }
  workflow.results.n_polarizations = workflow.tasks.length;

  archive.workflow = workflow;
  return archive;
}
