import type {
  ChangeDirection,
  ChangeRecord,
  Classification,
  DependencySpec,
  DiffReport,
  Severity,
  TableKind,
} from '../core/manifest/types';

const MARKERS: Record<Classification, string> = {
  major: '❗',
  minor: '📦',
  patch: '🔧',
  'pre-release': '🧪',
  'non-semver': '🤷',
  'source-kind-changed': '🔀',
};

const VERBS: Record<ChangeDirection, string> = {
  upgrade: 'bump',
  downgrade: 'drop',
  lateral: 'change',
};

const SECTION_NAMES = {
  normal: 'dependencies',
  dev: 'dev-dependencies',
  build: 'build-dependencies',
} as const;

export function tableLabel(table: TableKind): string {
  switch (table.kind) {
    case 'normal':
      return '';
    case 'dev':
      return ' (🖥️ dev-dependencies)';
    case 'build':
      return ' (🧱 build-dependencies)';
    case 'workspace':
      return ' (🗂️ workspace.dependencies)';
    case 'target':
      return ` (🎯 ${table.target} ${SECTION_NAMES[table.section]})`;
  }
}

export function describeSpec(spec: DependencySpec): string {
  const source = spec.source;
  switch (source.kind) {
    case 'registry':
      return source.registry ? `${source.requirement} (registry ${source.registry})` : source.requirement;
    case 'path':
      return source.requirement ? `path ${source.path} ${source.requirement}` : `path ${source.path}`;
    case 'git': {
      const ref = source.ref ? ` ${source.ref.kind} ${source.ref.value}` : '';
      const version = source.requirement ? ` ${source.requirement}` : '';
      return `git ${source.url}${ref}${version}`;
    }
    case 'workspace':
      return 'workspace';
  }
}

function formatFeatures(features: string[] | null): string {
  return features === null ? 'unset' : `[${features.join(', ')}]`;
}

function formatFlag(flag: boolean | null): string {
  return flag === null ? 'unset' : String(flag);
}

/** Attribute changes that the source description does not show. */
export function attributeChanges(before: DependencySpec, after: DependencySpec): string[] {
  const out: string[] = [];
  const featuresBefore = formatFeatures(before.features);
  const featuresAfter = formatFeatures(after.features);
  if (featuresBefore !== featuresAfter) out.push(`features ${featuresBefore} → ${featuresAfter}`);
  if (before.defaultFeatures !== after.defaultFeatures) {
    out.push(`default-features ${formatFlag(before.defaultFeatures)} → ${formatFlag(after.defaultFeatures)}`);
  }
  if (before.optional !== after.optional) out.push(`optional ${before.optional} → ${after.optional}`);
  if (before.package !== after.package) out.push(`package ${before.package ?? 'unset'} → ${after.package ?? 'unset'}`);
  return out;
}

export function renderChange(change: ChangeRecord): string {
  const name = `${change.key.name}${tableLabel(change.key.table)}`;
  const unparsable = change.unparsable.length > 0 ? ' (unparsable requirement)' : '';

  if (change.kind === 'added' && change.after) return `✨ add ${name} ${describeSpec(change.after)}${unparsable}`;
  if (change.kind === 'removed' && change.before) return `🗑️ remove ${name} ${describeSpec(change.before)}${unparsable}`;
  if (!change.before || !change.after) return `${change.kind} ${name}`;

  const marker = change.classification ? MARKERS[change.classification] : MARKERS['non-semver'];
  const verb = change.direction ? VERBS[change.direction] : 'change';
  const from = describeSpec(change.before);
  const to = describeSpec(change.after);
  const details = attributeChanges(change.before, change.after);
  const suffix = details.length > 0 ? ` (${details.join('; ')})` : '';
  return `${marker} ${verb} ${name} from ${from} to ${to}${suffix}`;
}

export function renderReport(report: DiffReport, minimumReportedSeverity: Severity): string {
  const lines = report.changes.map(renderChange);
  if (lines.length === 0) lines.push('🧹 No changes detected.');
  if (report.summary.suppressed > 0) {
    lines.push(`(${report.summary.suppressed} change(s) below ${minimumReportedSeverity} not shown)`);
  }
  return lines.join('\n');
}

export interface InspectRow {
  name: string;
  table: string;
  source: string;
  floor: string | null;
  unparsable: string | null;
}

export function renderInspect(rows: readonly InspectRow[]): string {
  if (rows.length === 0) return 'No dependencies declared.';
  return rows
    .map((row) => {
      const tail = row.unparsable !== null ? ' (unparsable requirement)' : row.floor !== null ? ` (floor ${row.floor})` : '';
      return `${row.name}${row.table} ${row.source}${tail}`;
    })
    .join('\n');
}
