/**
 * Result graph → JSON.
 *
 * Sections are indexed in a fixed order (entries in the order given, then
 * depth-first in field order). The first owning location of a section is
 * its canonical path; every other occurrence is written as
 * `{ "$ref": "#/<path>" }`. Reference fields never claim ownership, and
 * lists are never shared.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface SerializedRef {
  $ref: string;
}

const REFERENCE_KEYS: ReadonlySet<string> = new Set([
  'system_ref',
  'method_ref',
  'starting_method_ref',
  'section',
  'task',
  'spectrum_polarization',
]);

function isSectionLike(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

export function escapePointerSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

export class SectionIndex {
  private readonly paths = new Map<object, string>();

  /** Register `root` and everything it owns under `rootPath`. */
  register(root: object, rootPath: string): void {
    this.visit(root, rootPath);
  }

  pathOf(section: object): string | undefined {
    return this.paths.get(section);
  }

  private visit(value: object, at: string): void {
    if (this.paths.has(value)) return;
    // Lists are always written inline; only their items can be shared.
    if (!Array.isArray(value)) this.paths.set(value, at);
    const entries: Array<[string, unknown]> = Array.isArray(value)
      ? value.map((item, index): [string, unknown] => [String(index), item])
      : Object.entries(value);
    for (const [key, child] of entries) {
      if (!Array.isArray(value) && REFERENCE_KEYS.has(key)) continue;
      if (isSectionLike(child)) {
        this.visit(child, `${at}/${escapePointerSegment(key)}`);
      }
    }
  }
}

function toJson(value: unknown, at: string, index: SectionIndex): JsonValue {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (!isSectionLike(value)) return null;

  if (Array.isArray(value)) {
    return value.map((item, i) => toJson(item, `${at}/${i}`, index));
  }

  const canonical = index.pathOf(value);
  if (canonical !== undefined && canonical !== at) {
    return { $ref: `#${canonical}` };
  }

  const out: { [key: string]: JsonValue } = {};
  for (const [key, child] of Object.entries(value)) {
    if (child === undefined) continue;
    out[key] = toJson(child, `${at}/${escapePointerSegment(key)}`, index);
  }
  return out;
}

export interface NamedRoot {
  path: string;
  value: object;
}

/**
 * Serialize several roots that may reference each other. Roots are indexed
 * in the order given, so owners must come before the roots that reference
 * into them.
 */
export function serializeRoots(roots: readonly NamedRoot[]): JsonValue[] {
  const index = new SectionIndex();
  for (const root of roots) {
    index.register(root.value, root.path);
  }
  return roots.map(root => toJson(root.value, root.path, index));
}
