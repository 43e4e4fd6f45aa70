import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { isSeverity } from './manifest/semver';
import { SEVERITIES, type DiffOptions } from './manifest/types';

export const CONFIG_FILE_NAME = '.manifest-diff.json';

const SeveritySchema = z.enum(SEVERITIES);

export const ConfigFileSchema = z
  .object({
    include_dev_dependencies: z.boolean().optional(),
    include_build_dependencies: z.boolean().optional(),
    minimum_reported_severity: SeveritySchema.optional(),
    fail_on: SeveritySchema.nullable().optional(),
    manifest: z.string().min(1).optional(),
  })
  .strict();

export interface LoadedConfig {
  path: string | null;
  options: Partial<DiffOptions>;
  manifest?: string;
}

export type ConfigLoad =
  | { ok: true; config: LoadedConfig }
  | { ok: false; reason: 'config_invalid'; path: string; message: string };

export async function loadConfigFile(repoRoot: string): Promise<ConfigLoad> {
  const configPath = path.join(repoRoot, CONFIG_FILE_NAME);
  if (!(await fs.pathExists(configPath))) return { ok: true, config: { path: null, options: {} } };

  let raw: unknown;
  try {
    raw = await fs.readJSON(configPath);
  } catch (e) {
    return { ok: false, reason: 'config_invalid', path: configPath, message: e instanceof Error ? e.message : String(e) };
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    return { ok: false, reason: 'config_invalid', path: configPath, message };
  }

  const file = parsed.data;
  const options: Partial<DiffOptions> = {};
  if (file.include_dev_dependencies !== undefined) options.includeDevDependencies = file.include_dev_dependencies;
  if (file.include_build_dependencies !== undefined) options.includeBuildDependencies = file.include_build_dependencies;
  if (file.minimum_reported_severity !== undefined) options.minimumReportedSeverity = file.minimum_reported_severity;
  if (file.fail_on !== undefined) options.failOn = file.fail_on;
  return { ok: true, config: { path: configPath, options, ...(file.manifest ? { manifest: file.manifest } : {}) } };
}

export function parseBooleanFlag(raw: string | undefined): boolean | undefined {
  const v = String(raw ?? '').trim().toLowerCase();
  if (v === 'true' || v === '1' || v === 'yes') return true;
  if (v === 'false' || v === '0' || v === 'no') return false;
  return undefined;
}

/** Unrecognized values are ignored rather than rejected. */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<DiffOptions> {
  const options: Partial<DiffOptions> = {};
  const dev = parseBooleanFlag(env.MANIFEST_DIFF_INCLUDE_DEV);
  const build = parseBooleanFlag(env.MANIFEST_DIFF_INCLUDE_BUILD);
  const minSeverity = String(env.MANIFEST_DIFF_MIN_SEVERITY ?? '').trim();
  const failOn = String(env.MANIFEST_DIFF_FAIL_ON ?? '').trim();
  if (dev !== undefined) options.includeDevDependencies = dev;
  if (build !== undefined) options.includeBuildDependencies = build;
  if (isSeverity(minSeverity)) options.minimumReportedSeverity = minSeverity;
  if (isSeverity(failOn)) options.failOn = failOn;
  return options;
}
