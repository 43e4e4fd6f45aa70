import path from 'path';
import { loadConfigFile, optionsFromEnv } from '../../core/config';
import { resolveGitRoot } from '../../core/git';
import { createLogger } from '../../core/log';
import { compareKeys } from '../../core/manifest/keys';
import { normalizeRequirement } from '../../core/manifest/requirement';
import { declaredRequirement } from '../../core/manifest/severity';
import { formatVersion } from '../../core/manifest/semver';
import {
  extractManifest,
  ManifestError,
  mergeDiffOptions,
  runDiff,
  type DiffOptions,
  type ManifestSnapshot,
} from '../../core/manifest';
import {
  createGitRevisionProvider,
  STAGED_REVISION,
  WORKTREE_REVISION,
  type RetrievalError,
  type RevisionContentProvider,
} from '../../core/revision';
import { describeSpec, renderInspect, renderReport, tableLabel, type InspectRow } from '../format';
import type { DiffInput, InspectInput } from '../schemas/diffSchemas';
import type { CLIResult, CLIError } from '../types';
import { success, error, ErrorHints, ErrorReasons, ExitCodes } from '../types';

export const DEFAULT_MANIFEST = 'Cargo.toml';

export interface ManifestHandlerDeps {
  createProvider?: (repoRoot: string, manifestPath: string) => RevisionContentProvider;
  env?: NodeJS.ProcessEnv;
}

function flagOptions(input: DiffInput): Partial<DiffOptions> {
  const options: Partial<DiffOptions> = {};
  if (input.dev !== undefined) options.includeDevDependencies = input.dev;
  if (input.build !== undefined) options.includeBuildDependencies = input.build;
  if (input.minSeverity !== undefined) options.minimumReportedSeverity = input.minSeverity;
  if (input.failOn !== undefined) options.failOn = input.failOn;
  return options;
}

function manifestErrorHint(reason: string): string | undefined {
  if (reason === ErrorReasons.MALFORMED_MANIFEST) return ErrorHints.MALFORMED_MANIFEST;
  if (reason === ErrorReasons.DUPLICATE_DEPENDENCY_KEY) return ErrorHints.DUPLICATE_DEPENDENCY_KEY;
  return undefined;
}

export async function handleDiff(input: DiffInput, deps: ManifestHandlerDeps = {}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'diff' });
  const startedAt = Date.now();

  try {
    const repoRoot = await resolveGitRoot(path.resolve(input.path));
    const config = await loadConfigFile(repoRoot);
    if (!config.ok) {
      log.error('diff', { ok: false, error: config.reason, path: config.path });
      return error(config.reason, { repoRoot, path: config.path, message: config.message, hint: ErrorHints.CONFIG_INVALID });
    }

    const manifest = input.manifest ?? config.config.manifest ?? DEFAULT_MANIFEST;
    const before = input.before;
    const after = input.after ?? (input.staged ? STAGED_REVISION : WORKTREE_REVISION);
    const options = mergeDiffOptions(config.config.options, optionsFromEnv(deps.env), flagOptions(input));

    const provider = (deps.createProvider ?? createGitRevisionProvider)(repoRoot, manifest);
    const [beforeText, afterText] = await Promise.all([
      provider.getManifestText(before),
      provider.getManifestText(after),
    ]);
    const retrievalFailure = (failure: RetrievalError): CLIError => {
      log.error('diff', { ok: false, error: failure.reason, revision: failure.revision });
      return error(failure.reason, {
        repoRoot,
        manifest,
        revision: failure.revision,
        message: failure.message,
        hint: ErrorHints.RETRIEVAL_FAILED,
      });
    };
    if (!beforeText.ok) return retrievalFailure(beforeText.error);
    if (!afterText.ok) return retrievalFailure(afterText.error);

    const result = runDiff(beforeText.text, afterText.text, options);
    if (!result.ok) {
      const { reason, side, message, key } = result.error;
      log.error('diff', { ok: false, error: reason, side });
      return error(reason, {
        repoRoot,
        manifest,
        side,
        revision: side === 'before' ? before : after,
        message,
        ...(key ? { key } : {}),
        ...(manifestErrorHint(reason) ? { hint: manifestErrorHint(reason) } : {}),
      });
    }

    const report = result.report;
    const manifestLog = log.child({ component: 'manifest', manifest });
    for (const change of report.changes) {
      for (const marker of change.unparsable) {
        manifestLog.warn('unparsable_requirement', {
          dependency: change.key.name,
          side: marker.side,
          requirement: marker.requirement,
        });
      }
    }
    const failed = result.gateFailed;
    log.info('diff', {
      ok: true,
      repoRoot,
      manifest,
      before,
      after,
      total: report.summary.total,
      suppressed: report.summary.suppressed,
      highestSeverity: report.summary.highestSeverity,
      gateFailed: failed,
      duration_ms: Date.now() - startedAt,
    });

    return success({
      repoRoot,
      manifest,
      before,
      after,
      options,
      report,
      gate: { failOn: options.failOn, failed },
      ...(input.json ? {} : { textOutput: renderReport(report, options.minimumReportedSeverity) }),
      exitCode: failed ? ExitCodes.GATE_FAILED : ExitCodes.OK,
    });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error('diff', { ok: false, err: message });
    return error(ErrorReasons.INTERNAL_ERROR, { message });
  }
}

export async function handleInspect(input: InspectInput, deps: ManifestHandlerDeps = {}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'inspect' });
  const startedAt = Date.now();

  try {
    const repoRoot = await resolveGitRoot(path.resolve(input.path));
    const config = await loadConfigFile(repoRoot);
    if (!config.ok) {
      log.error('inspect', { ok: false, error: config.reason, path: config.path });
      return error(config.reason, { repoRoot, path: config.path, message: config.message, hint: ErrorHints.CONFIG_INVALID });
    }
    const manifest = input.manifest ?? config.config.manifest ?? DEFAULT_MANIFEST;

    const provider = (deps.createProvider ?? createGitRevisionProvider)(repoRoot, manifest);
    const text = await provider.getManifestText(input.rev);
    if (!text.ok) {
      log.error('inspect', { ok: false, error: text.error.reason, revision: text.error.revision });
      return error(text.error.reason, {
        repoRoot,
        manifest,
        revision: text.error.revision,
        message: text.error.message,
        hint: ErrorHints.RETRIEVAL_FAILED,
      });
    }

    let snapshot: ManifestSnapshot;
    try {
      snapshot = extractManifest(text.text);
    } catch (e) {
      if (!(e instanceof ManifestError)) throw e;
      log.error('inspect', { ok: false, error: e.reason });
      return error(e.reason, {
        repoRoot,
        manifest,
        revision: input.rev,
        message: e.message,
        ...(e.key ? { key: e.key } : {}),
        ...(manifestErrorHint(e.reason) ? { hint: manifestErrorHint(e.reason) } : {}),
      });
    }

    const rows: InspectRow[] = [...snapshot.values()]
      .sort((a, b) => compareKeys(a.key, b.key))
      .map(({ key, spec }) => {
        const requirement = declaredRequirement(spec);
        const parsed = requirement === null ? null : normalizeRequirement(requirement);
        return {
          name: key.name,
          table: tableLabel(key.table),
          source: describeSpec(spec),
          floor: parsed && parsed.ok ? formatVersion(parsed.requirement.floor) : null,
          unparsable: parsed && !parsed.ok ? parsed.message : null,
        };
      });

    log.info('inspect', {
      ok: true,
      repoRoot,
      manifest,
      revision: input.rev,
      dependencies: rows.length,
      duration_ms: Date.now() - startedAt,
    });

    return success({
      repoRoot,
      manifest,
      revision: input.rev,
      dependencies: rows,
      ...(input.json ? {} : { textOutput: renderInspect(rows) }),
    });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error('inspect', { ok: false, err: message });
    return error(ErrorReasons.INTERNAL_ERROR, { message });
  }
}
