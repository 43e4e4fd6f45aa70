import { diffSnapshots } from './diff';
import { extractManifest, ManifestError } from './extract';
import { filterSnapshot, gateFails, isReported, mergeDiffOptions } from './options';
import { assembleReport } from './report';
import { classifyRecord } from './severity';
import type { DiffError, DiffOptions, DiffResult, ManifestSnapshot } from './types';

export * from './types';
export { extractManifest, ManifestError } from './extract';
export { normalizeRequirement } from './requirement';
export { diffSnapshots } from './diff';
export { classifyChange, classifyRecord } from './severity';
export { assembleReport } from './report';
export { compareVersions, formatVersion, isSeverity } from './semver';
export { defaultDiffOptions, gateFails, mergeDiffOptions } from './options';

type SideExtraction = { ok: true; snapshot: ManifestSnapshot } | { ok: false; error: DiffError };

function extractSide(text: string, side: DiffError['side']): SideExtraction {
  try {
    return { ok: true, snapshot: extractManifest(text) };
  } catch (e) {
    if (!(e instanceof ManifestError)) throw e;
    return { ok: false, error: { reason: e.reason, side, message: e.message, ...(e.key ? { key: e.key } : {}) } };
  }
}

/**
 * Pure diff of two manifest texts. Structural failures in either text abort
 * the run; unparsable requirements only mark their own record.
 */
export function runDiff(beforeText: string, afterText: string, options?: Partial<DiffOptions>): DiffResult {
  const opts = mergeDiffOptions(options);
  const before = extractSide(beforeText, 'before');
  if (!before.ok) return { ok: false, error: before.error };
  const after = extractSide(afterText, 'after');
  if (!after.ok) return { ok: false, error: after.error };

  const classified = diffSnapshots(filterSnapshot(before.snapshot, opts), filterSnapshot(after.snapshot, opts)).map(classifyRecord);
  const reported = classified.filter((r) => isReported(r, opts));
  return {
    ok: true,
    report: assembleReport(reported, classified.length - reported.length),
    gateFailed: gateFails(classified, opts.failOn),
  };
}
