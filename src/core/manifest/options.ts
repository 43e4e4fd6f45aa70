import { isAtLeast } from './semver';
import { tableSection } from './keys';
import type { ChangeRecord, DiffOptions, ManifestSnapshot } from './types';

export function defaultDiffOptions(): DiffOptions {
  return {
    includeDevDependencies: true,
    includeBuildDependencies: true,
    minimumReportedSeverity: 'non-semver',
    failOn: null,
  };
}

export function mergeDiffOptions(...layers: Array<Partial<DiffOptions> | undefined>): DiffOptions {
  const merged = defaultDiffOptions();
  for (const layer of layers) {
    if (!layer) continue;
    if (layer.includeDevDependencies !== undefined) merged.includeDevDependencies = layer.includeDevDependencies;
    if (layer.includeBuildDependencies !== undefined) merged.includeBuildDependencies = layer.includeBuildDependencies;
    if (layer.minimumReportedSeverity !== undefined) merged.minimumReportedSeverity = layer.minimumReportedSeverity;
    if (layer.failOn !== undefined) merged.failOn = layer.failOn;
  }
  return merged;
}

/** Drops dev and build tables (top-level and per target) the options exclude. */
export function filterSnapshot(snapshot: ManifestSnapshot, options: DiffOptions): ManifestSnapshot {
  if (options.includeDevDependencies && options.includeBuildDependencies) return snapshot;
  const out = new Map(snapshot);
  for (const [id, entry] of snapshot) {
    const section = tableSection(entry.key.table);
    if ((section === 'dev' && !options.includeDevDependencies) || (section === 'build' && !options.includeBuildDependencies)) {
      out.delete(id);
    }
  }
  return out;
}

/**
 * Whether a classified record stays in the report. Only measured severities
 * below the threshold are dropped; added, removed, source-kind and
 * non-semver records always stay.
 */
export function isReported(record: ChangeRecord, options: DiffOptions): boolean {
  const c = record.classification;
  if (c === null || c === 'source-kind-changed' || c === 'non-semver') return true;
  return isAtLeast(c, options.minimumReportedSeverity);
}

export function gateFails(records: readonly ChangeRecord[], failOn: DiffOptions['failOn']): boolean {
  if (failOn === null) return false;
  return records.some((r) => {
    const c = r.classification;
    return c !== null && c !== 'source-kind-changed' && isAtLeast(c, failOn);
  });
}
