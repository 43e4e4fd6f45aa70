import { compareKeys } from './keys';
import type { ChangeKind, ChangeRecord, DependencySource, DependencySpec, ManifestSnapshot } from './types';

const KIND_ORDER: Record<ChangeKind, number> = {
  added: 0,
  removed: 1,
  changed: 2,
};

function sameList(a: readonly string[] | null, b: readonly string[] | null): boolean {
  if (a === null || b === null) return a === b;
  return a.length === b.length && a.every((item, i) => item === b[i]);
}

function sameSource(a: DependencySource, b: DependencySource): boolean {
  switch (a.kind) {
    case 'registry':
      return b.kind === 'registry' && a.requirement === b.requirement && a.registry === b.registry;
    case 'path':
      return b.kind === 'path' && a.path === b.path && a.requirement === b.requirement;
    case 'git':
      return (
        b.kind === 'git' &&
        a.url === b.url &&
        a.requirement === b.requirement &&
        a.ref?.kind === b.ref?.kind &&
        a.ref?.value === b.ref?.value
      );
    case 'workspace':
      return b.kind === 'workspace';
  }
}

export function sameSpec(a: DependencySpec, b: DependencySpec): boolean {
  return (
    sameSource(a.source, b.source) &&
    sameList(a.features, b.features) &&
    a.defaultFeatures === b.defaultFeatures &&
    a.optional === b.optional &&
    a.package === b.package
  );
}

export function compareChangeRecords(a: ChangeRecord, b: ChangeRecord): number {
  return KIND_ORDER[a.kind] - KIND_ORDER[b.kind] || compareKeys(a.key, b.key);
}

function record(
  kind: ChangeKind,
  key: ChangeRecord['key'],
  before: DependencySpec | null,
  after: DependencySpec | null
): ChangeRecord {
  return { key, kind, before, after, classification: null, direction: null, unparsable: [] };
}

/**
 * Added, removed and changed dependencies between two snapshots, ordered by
 * change kind, then name, then table kind. Classification is left unset.
 */
export function diffSnapshots(before: ManifestSnapshot, after: ManifestSnapshot): ChangeRecord[] {
  const out: ChangeRecord[] = [];
  for (const [id, next] of after) {
    const prev = before.get(id);
    if (!prev) out.push(record('added', next.key, null, next.spec));
    else if (!sameSpec(prev.spec, next.spec)) out.push(record('changed', next.key, prev.spec, next.spec));
  }
  for (const [id, prev] of before) {
    if (!after.has(id)) out.push(record('removed', prev.key, prev.spec, null));
  }
  out.sort(compareChangeRecords);
  return out;
}
