import { normalizeRequirement } from './requirement';
import { compareVersions, samePrerelease } from './semver';
import type {
  ChangeDirection,
  ChangeRecord,
  Classification,
  DependencySpec,
  SemverVersion,
  Severity,
  UnparsableMarker,
} from './types';

/** Declared version requirement, if the source carries one. */
export function declaredRequirement(spec: DependencySpec): string | null {
  return spec.source.kind === 'workspace' ? null : spec.source.requirement;
}

/**
 * Magnitude of the move between two floors. Below 1.0.0 the leftmost
 * non-zero component is the compatibility boundary.
 */
export function floorSeverity(a: SemverVersion, b: SemverVersion): Severity {
  if (a.major !== b.major) return 'major';
  if (a.minor !== b.minor) return a.major === 0 ? 'major' : 'minor';
  if (a.patch !== b.patch) {
    if (a.major > 0) return 'patch';
    return a.minor > 0 ? 'minor' : 'major';
  }
  if (!samePrerelease(a.pre, b.pre)) return 'pre-release';
  return 'patch';
}

export function classifyChange(before: DependencySpec, after: DependencySpec): Classification {
  if (before.source.kind !== 'registry' || after.source.kind !== 'registry') return 'source-kind-changed';
  const a = normalizeRequirement(before.source.requirement);
  const b = normalizeRequirement(after.source.requirement);
  if (!a.ok || !b.ok) return 'non-semver';
  return floorSeverity(a.requirement.floor, b.requirement.floor);
}

export function changeDirection(before: DependencySpec, after: DependencySpec): ChangeDirection | null {
  const a = declaredRequirement(before);
  const b = declaredRequirement(after);
  if (a === null || b === null) return null;
  const prev = normalizeRequirement(a);
  const next = normalizeRequirement(b);
  if (!prev.ok || !next.ok) return null;
  const cmp = compareVersions(prev.requirement.floor, next.requirement.floor);
  if (cmp < 0) return 'upgrade';
  if (cmp > 0) return 'downgrade';
  return 'lateral';
}

function unparsableMarker(spec: DependencySpec | null, side: UnparsableMarker['side']): UnparsableMarker | null {
  const requirement = spec ? declaredRequirement(spec) : null;
  if (requirement === null) return null;
  const parsed = normalizeRequirement(requirement);
  return parsed.ok ? null : { side, requirement, message: parsed.message };
}

/** Fills classification, direction and unparsable markers on a diff record. */
export function classifyRecord(record: ChangeRecord): ChangeRecord {
  const unparsable = [unparsableMarker(record.before, 'before'), unparsableMarker(record.after, 'after')].filter(
    (m): m is UnparsableMarker => m !== null
  );
  if (record.kind !== 'changed' || !record.before || !record.after) {
    return { ...record, unparsable };
  }
  return {
    ...record,
    classification: classifyChange(record.before, record.after),
    direction: changeDirection(record.before, record.after),
    unparsable,
  };
}
