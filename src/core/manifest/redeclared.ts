import { dependencyKeyId } from './keys';
import type { DependencyKey, TableKind, TableSection } from './types';

const SECTION_BY_TABLE = new Map<string, TableSection>([
  ['dependencies', 'normal'],
  ['dev-dependencies', 'dev'],
  ['dev_dependencies', 'dev'],
  ['build-dependencies', 'build'],
  ['build_dependencies', 'build'],
]);

type Declaration = 'value' | 'dotted' | 'table';

interface LocatedTable {
  table: TableKind;
  path: string;
  /** Key segments after the dependency table itself, e.g. `['serde']` for `[dependencies.serde]`. */
  rest: string[];
}

export interface Redeclaration {
  key: DependencyKey;
  tablePath: string;
}

function readKey(text: string, start: number): { segments: string[]; end: number } | null {
  const segments: string[] = [];
  let i = start;
  for (;;) {
    while (text[i] === ' ' || text[i] === '\t') i++;
    const quote = text[i];
    if (quote === '"' || quote === "'") {
      const close = text.indexOf(quote, i + 1);
      if (close < 0) return null;
      segments.push(text.slice(i + 1, close));
      i = close + 1;
    } else {
      const bare = /^[A-Za-z0-9_-]+/.exec(text.slice(i));
      if (!bare) return null;
      segments.push(bare[0]);
      i += bare[0].length;
    }
    while (text[i] === ' ' || text[i] === '\t') i++;
    if (text[i] !== '.') return { segments, end: i };
    i++;
  }
}

function locateTable(segments: string[]): LocatedTable | null {
  const [first, second, third] = segments;
  if (first === undefined) return null;
  const section = SECTION_BY_TABLE.get(first);
  if (section !== undefined) return { table: { kind: section }, path: first, rest: segments.slice(1) };
  if (first === 'workspace' && second === 'dependencies') {
    return { table: { kind: 'workspace' }, path: 'workspace.dependencies', rest: segments.slice(2) };
  }
  if (first === 'target' && second !== undefined && third !== undefined) {
    const targetSection = SECTION_BY_TABLE.get(third);
    if (targetSection === undefined) return null;
    return {
      table: { kind: 'target', target: second, section: targetSection },
      path: `target.${second}.${third}`,
      rest: segments.slice(3),
    };
  }
  return null;
}

/**
 * Line scan for a dependency declared twice in one table. TOML parsers reject
 * such a document outright, so this runs on text the parser refused to tell a
 * repeated dependency apart from other syntax errors.
 */
export function findRedeclaredDependency(rawText: string): Redeclaration | null {
  const seen = new Map<string, Declaration>();
  let current: LocatedTable | null = null;
  let inMultilineString = false;

  const declare = (name: string, located: LocatedTable, how: Declaration): Redeclaration | null => {
    const key: DependencyKey = { name, table: located.table };
    const id = dependencyKeyId(key);
    const previous = seen.get(id);
    // `serde.version` and `serde.features` extend one dependency
    if (previous !== undefined && (how !== 'dotted' || previous === 'value')) return { key, tablePath: located.path };
    if (previous === undefined) seen.set(id, how);
    return null;
  };

  for (const line of rawText.split(/\r?\n/)) {
    const togglesString = (line.match(/"""|'''/g) ?? []).length % 2 === 1;
    if (inMultilineString) {
      inMultilineString = !togglesString;
      continue;
    }
    inMultilineString = togglesString;

    const trimmed = line.trim();
    if (trimmed.startsWith('[[')) {
      current = null;
      continue;
    }
    if (trimmed.startsWith('[')) {
      current = null;
      const header = readKey(trimmed, 1);
      if (!header || trimmed[header.end] !== ']') continue;
      const located = locateTable(header.segments);
      if (!located) continue;
      const name = located.rest[0];
      if (name === undefined) {
        current = located;
        continue;
      }
      const found = declare(name, located, located.rest.length === 1 ? 'table' : 'dotted');
      if (found) return found;
      continue;
    }
    if (!current) continue;
    const key = readKey(trimmed, 0);
    const name = key?.segments[0];
    if (!key || name === undefined || trimmed[key.end] !== '=') continue;
    const found = declare(name, current, key.segments.length > 1 ? 'dotted' : 'value');
    if (found) return found;
  }
  return null;
}
