import type { DependencyKey, TableKind, TableSection } from './types';

const KIND_ORDER: Record<TableKind['kind'], number> = {
  normal: 0,
  dev: 1,
  build: 2,
  workspace: 3,
  target: 4,
};

const SECTION_ORDER: Record<TableSection, number> = {
  normal: 0,
  dev: 1,
  build: 2,
};

export function tableId(table: TableKind): string {
  return table.kind === 'target' ? `target:${table.section}:${table.target}` : table.kind;
}

export function dependencyKeyId(key: DependencyKey): string {
  return `${tableId(key.table)}\u0000${key.name}`;
}

/** Code-unit order, independent of the host locale. */
export function compareText(a: string, b: string): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

export function compareTableKinds(a: TableKind, b: TableKind): number {
  const byKind = KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
  if (byKind !== 0) return byKind;
  if (a.kind === 'target' && b.kind === 'target') {
    return compareText(a.target, b.target) || SECTION_ORDER[a.section] - SECTION_ORDER[b.section];
  }
  return 0;
}

export function compareKeys(a: DependencyKey, b: DependencyKey): number {
  return compareText(a.name, b.name) || compareTableKinds(a.table, b.table);
}

/** dev and build sections, whether top-level or under a target. */
export function tableSection(table: TableKind): TableSection | 'workspace' {
  if (table.kind === 'target') return table.section;
  return table.kind;
}
