import { escapePointerSegment, serializeRoots, type JsonValue, type NamedRoot } from '../archive/serialize.js';
import type { ChildRun } from './childRun.js';
import type { OceanParseResult } from './parser.js';

export interface SerializedParseResult {
  mainfile: string;
  n_children: number;
  /** Keyed by spectra file name, in discovery order. */
  children?: Record<string, JsonValue>;
  workflow: JsonValue;
}

function childPath(key: string): string {
  return `/children/${escapePointerSegment(key)}`;
}

/**
 * Children are indexed before the workflow so that every shared section is
 * written inside the child that owns it. Without children in the output,
 * workflow references still name their `#/children/...` paths.
 */
export function serializeParseResult(
  result: OceanParseResult,
  options: { includeChildren?: boolean } = {},
): SerializedParseResult {
  const includeChildren = options.includeChildren ?? true;
  const roots: NamedRoot[] = result.children.map(child => ({ path: childPath(child.key), value: child.archive }));
  roots.push({ path: '/workflow', value: result.workflow });

  const serialized = serializeRoots(roots);
  const workflow = serialized[serialized.length - 1] ?? null;

  const out: SerializedParseResult = {
    mainfile: result.mainfile,
    n_children: result.children.length,
    workflow,
  };
  if (includeChildren) {
    const children: Record<string, JsonValue> = {};
    result.children.forEach((child, i) => {
      children[child.key] = serialized[i] ?? null;
    });
    out.children = children;
  }
  return out;
}

export function serializeChildRun(child: ChildRun): JsonValue {
  const [serialized] = serializeRoots([{ path: '', value: child.archive }]);
  return serialized ?? null;
}
