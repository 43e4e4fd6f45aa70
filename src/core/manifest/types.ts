export type TableSection = 'normal' | 'dev' | 'build';

export type TableKind =
  | { kind: 'normal' }
  | { kind: 'dev' }
  | { kind: 'build' }
  | { kind: 'workspace' }
  | { kind: 'target'; target: string; section: TableSection };

export interface DependencyKey {
  name: string;
  table: TableKind;
}

export type GitRef =
  | { kind: 'branch'; value: string }
  | { kind: 'tag'; value: string }
  | { kind: 'rev'; value: string };

export type DependencySource =
  | { kind: 'registry'; requirement: string; registry: string | null }
  | { kind: 'path'; path: string; requirement: string | null }
  | { kind: 'git'; url: string; ref: GitRef | null; requirement: string | null }
  | { kind: 'workspace' };

export type SourceKind = DependencySource['kind'];

export interface DependencySpec {
  source: DependencySource;
  /** Declared order; null when the entry has no `features` key. */
  features: string[] | null;
  /** null when neither `default-features` nor `default_features` is declared. */
  defaultFeatures: boolean | null;
  optional: boolean;
  /** Upstream package name of a renamed dependency. */
  package: string | null;
}

export interface SnapshotEntry {
  key: DependencyKey;
  spec: DependencySpec;
}

/** Keyed by `dependencyKeyId`. */
export type ManifestSnapshot = ReadonlyMap<string, SnapshotEntry>;

export type RequirementOp = 'exact' | 'greater' | 'greater-eq' | 'less' | 'less-eq' | 'tilde' | 'caret' | 'wildcard';

export type RequirementKind = 'exact' | 'caret' | 'tilde' | 'wildcard' | 'range';

export interface BoundClause {
  op: RequirementOp;
  major: number | null;
  minor: number | null;
  patch: number | null;
  pre: string[];
}

export interface SemverVersion {
  major: number;
  minor: number;
  patch: number;
  pre: string[];
}

export interface NormalizedRequirement {
  raw: string;
  kind: RequirementKind;
  clauses: BoundClause[];
  floor: SemverVersion;
}

export const SEVERITIES = ['major', 'minor', 'patch', 'pre-release', 'non-semver'] as const;

export type Severity = (typeof SEVERITIES)[number];

export type Classification = Severity | 'source-kind-changed';

export type ChangeKind = 'added' | 'removed' | 'changed';

export type ChangeDirection = 'upgrade' | 'downgrade' | 'lateral';

export interface UnparsableMarker {
  side: 'before' | 'after';
  requirement: string;
  message: string;
}

export interface ChangeRecord {
  key: DependencyKey;
  kind: ChangeKind;
  before: DependencySpec | null;
  after: DependencySpec | null;
  classification: Classification | null;
  direction: ChangeDirection | null;
  unparsable: UnparsableMarker[];
}

export interface ReportSummary {
  total: number;
  added: number;
  removed: number;
  changed: number;
  unparsable: number;
  suppressed: number;
  hasChanges: boolean;
  highestSeverity: Severity | null;
}

export interface DiffReport {
  changes: readonly ChangeRecord[];
  added: readonly ChangeRecord[];
  removed: readonly ChangeRecord[];
  changed: readonly ChangeRecord[];
  bySeverity: Readonly<Record<Classification, readonly ChangeRecord[]>>;
  summary: ReportSummary;
}

export type ManifestErrorReason = 'malformed_manifest' | 'duplicate_dependency_key';

export interface DiffError {
  reason: ManifestErrorReason;
  side: 'before' | 'after';
  message: string;
  key?: DependencyKey;
}

/** `gateFailed` covers every classified change, including those the report leaves out. */
export type DiffResult = { ok: true; report: DiffReport; gateFailed: boolean } | { ok: false; error: DiffError };

export interface DiffOptions {
  includeDevDependencies: boolean;
  includeBuildDependencies: boolean;
  minimumReportedSeverity: Severity;
  failOn: Severity | null;
}
