import { isSeverity, severityRank } from './semver';
import type { ChangeRecord, Classification, DiffReport, Severity } from './types';

/** Groups already classified records; the input order is kept in every group. */
export function assembleReport(changes: readonly ChangeRecord[], suppressed = 0): DiffReport {
  const bySeverity: Record<Classification, ChangeRecord[]> = {
    major: [],
    minor: [],
    patch: [],
    'pre-release': [],
    'non-semver': [],
    'source-kind-changed': [],
  };
  const added: ChangeRecord[] = [];
  const removed: ChangeRecord[] = [];
  const changed: ChangeRecord[] = [];
  let highestSeverity: Severity | null = null;

  for (const change of changes) {
    if (change.kind === 'added') added.push(change);
    else if (change.kind === 'removed') removed.push(change);
    else changed.push(change);

    const classification = change.classification;
    if (classification === null) continue;
    bySeverity[classification].push(change);
    if (isSeverity(classification) && (highestSeverity === null || severityRank(classification) < severityRank(highestSeverity))) {
      highestSeverity = classification;
    }
  }

  return {
    changes: [...changes],
    added,
    removed,
    changed,
    bySeverity,
    summary: {
      total: changes.length,
      added: added.length,
      removed: removed.length,
      changed: changed.length,
      unparsable: changes.filter((c) => c.unparsable.length > 0).length,
      suppressed,
      hasChanges: changes.length > 0,
      highestSeverity,
    },
  };
}
