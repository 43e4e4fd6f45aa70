import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { dependencyKeyId } from './keys';
import { findRedeclaredDependency } from './redeclared';
import type {
  DependencyKey,
  DependencySpec,
  GitRef,
  ManifestErrorReason,
  ManifestSnapshot,
  SnapshotEntry,
  TableKind,
  TableSection,
} from './types';

export class ManifestError extends Error {
  constructor(
    readonly reason: ManifestErrorReason,
    message: string,
    readonly key?: DependencyKey
  ) {
    super(message);
    this.name = 'ManifestError';
  }
}

const DetailedDependencySchema = z
  .object({
    version: z.string().optional(),
    path: z.string().optional(),
    git: z.string().optional(),
    branch: z.string().optional(),
    tag: z.string().optional(),
    rev: z.string().optional(),
    registry: z.string().optional(),
    workspace: z.boolean().optional(),
    features: z.array(z.string()).optional(),
    'default-features': z.boolean().optional(),
    default_features: z.boolean().optional(),
    optional: z.boolean().optional(),
    package: z.string().optional(),
  })
  .passthrough();

type DetailedDependency = z.infer<typeof DetailedDependencySchema>;

const DependencyTableSchema = z.record(z.union([z.string(), DetailedDependencySchema]));

type DependencyTable = z.infer<typeof DependencyTableSchema>;

const SectionTablesSchema = {
  dependencies: DependencyTableSchema.optional(),
  'dev-dependencies': DependencyTableSchema.optional(),
  dev_dependencies: DependencyTableSchema.optional(),
  'build-dependencies': DependencyTableSchema.optional(),
  build_dependencies: DependencyTableSchema.optional(),
};

const TargetTableSchema = z.object(SectionTablesSchema).passthrough();

const ManifestDocumentSchema = z
  .object({
    package: z.record(z.unknown()).optional(),
    workspace: z.object({ dependencies: DependencyTableSchema.optional() }).passthrough().optional(),
    target: z.record(TargetTableSchema).optional(),
    ...SectionTablesSchema,
  })
  .passthrough();

type SectionTables = z.infer<typeof TargetTableSchema>;

type SectionTableName = keyof typeof SectionTablesSchema;

/** Table names per section; the underscore spellings are aliases. */
const SECTION_TABLES: ReadonlyArray<[TableSection, ReadonlyArray<SectionTableName>]> = [
  ['normal', ['dependencies']],
  ['dev', ['dev-dependencies', 'dev_dependencies']],
  ['build', ['build-dependencies', 'build_dependencies']],
];

function malformed(message: string): ManifestError {
  return new ManifestError('malformed_manifest', message);
}

function duplicateKey(key: DependencyKey, tablePath: string): ManifestError {
  return new ManifestError('duplicate_dependency_key', `dependency \`${key.name}\` is declared more than once in ${tablePath}`, key);
}

function gitRef(entry: DetailedDependency, where: string): GitRef | null {
  const refs: GitRef[] = [];
  if (entry.branch !== undefined) refs.push({ kind: 'branch', value: entry.branch });
  if (entry.tag !== undefined) refs.push({ kind: 'tag', value: entry.tag });
  if (entry.rev !== undefined) refs.push({ kind: 'rev', value: entry.rev });
  if (refs.length > 1) throw malformed(`${where}: only one of \`branch\`, \`tag\` or \`rev\` may be given`);
  return refs[0] ?? null;
}

function toSpec(entry: string | DetailedDependency, where: string): DependencySpec {
  if (typeof entry === 'string') {
    return {
      source: { kind: 'registry', requirement: entry, registry: null },
      features: null,
      defaultFeatures: null,
      optional: false,
      package: null,
    };
  }

  if (entry['default-features'] !== undefined && entry.default_features !== undefined) {
    throw malformed(`${where}: \`default-features\` and \`default_features\` are both declared`);
  }
  const common = {
    features: entry.features ?? null,
    defaultFeatures: entry['default-features'] ?? entry.default_features ?? null,
    optional: entry.optional ?? false,
    package: entry.package ?? null,
  };

  if (entry.workspace !== undefined) {
    if (!entry.workspace) throw malformed(`${where}: \`workspace\` may only be \`true\``);
    if (entry.version !== undefined || entry.path !== undefined || entry.git !== undefined) {
      throw malformed(`${where}: a workspace-inherited dependency cannot also declare \`version\`, \`path\` or \`git\``);
    }
    return { source: { kind: 'workspace' }, ...common };
  }
  if (entry.git !== undefined) {
    return {
      source: { kind: 'git', url: entry.git, ref: gitRef(entry, where), requirement: entry.version ?? null },
      ...common,
    };
  }
  if (entry.path !== undefined) {
    return { source: { kind: 'path', path: entry.path, requirement: entry.version ?? null }, ...common };
  }
  if (entry.version !== undefined) {
    return { source: { kind: 'registry', requirement: entry.version, registry: entry.registry ?? null }, ...common };
  }
  throw malformed(`${where}: dependency declares none of \`version\`, \`path\`, \`git\` or \`workspace\``);
}

function addTable(
  entries: Map<string, SnapshotEntry>,
  table: TableKind,
  tablePath: string,
  deps: DependencyTable | undefined
): void {
  if (!deps) return;
  for (const [name, value] of Object.entries(deps)) {
    const key: DependencyKey = { name, table };
    const id = dependencyKeyId(key);
    if (entries.has(id)) {
      throw duplicateKey(key, tablePath);
    }
    entries.set(id, { key, spec: toSpec(value, `${tablePath}.${name}`) });
  }
}

function addSections(
  entries: Map<string, SnapshotEntry>,
  tables: SectionTables,
  kindFor: (section: TableSection) => TableKind,
  prefix: string
): void {
  for (const [section, names] of SECTION_TABLES) {
    for (const tableName of names) {
      addTable(entries, kindFor(section), `${prefix}${tableName}`, tables[tableName]);
    }
  }
}

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

/**
 * Parses manifest text into a dependency snapshot. Throws `ManifestError`
 * for invalid TOML, a missing `[package]`/`[workspace]` table, malformed
 * entries, or the same dependency declared twice in one table kind.
 */
export function extractManifest(rawText: string): ManifestSnapshot {
  let document: unknown;
  try {
    document = parseToml(rawText);
  } catch (e) {
    const redeclared = findRedeclaredDependency(rawText);
    if (redeclared) throw duplicateKey(redeclared.key, redeclared.tablePath);
    throw malformed(`invalid TOML: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = ManifestDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw malformed(`invalid manifest: ${parsed.error.issues.map(formatIssue).join('; ')}`);
  }
  const manifest = parsed.data;
  if (!manifest.package && !manifest.workspace) {
    throw malformed('manifest has neither a [package] nor a [workspace] table');
  }

  const entries = new Map<string, SnapshotEntry>();
  addSections(entries, manifest, (section) => ({ kind: section }), '');
  addTable(entries, { kind: 'workspace' }, 'workspace.dependencies', manifest.workspace?.dependencies);
  for (const [target, tables] of Object.entries(manifest.target ?? {})) {
    addSections(entries, tables, (section) => ({ kind: 'target', target, section }), `target.${target}.`);
  }
  return entries;
}
