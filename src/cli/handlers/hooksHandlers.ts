import path from 'path';
import { spawnSync } from 'child_process';
import fs from 'fs-extra';
import { isGitRepo, resolveGitRoot } from '../../core/git';
import { createLogger } from '../../core/log';
import type { HooksInput } from '../schemas/hooksSchemas';
import type { CLIResult, CLIError } from '../types';
import { success, error, ErrorHints, ErrorReasons } from '../types';

export const HOOKS_DIR = '.githooks';
export const HOOK_NAMES = ['pre-commit'] as const;

function runGit(cwd: string, args: string[]) {
  const res = spawnSync('git', args, { cwd, stdio: 'inherit' });
  if (res.status !== 0) throw new Error(`git ${args.join(' ')} failed`);
}

function getGitConfig(cwd: string, key: string): string | null {
  const res = spawnSync('git', ['config', '--get', key], { cwd, stdio: 'pipe', encoding: 'utf-8' });
  if (res.status !== 0) return null;
  const out = String(res.stdout ?? '').trim();
  return out.length > 0 ? out : null;
}

async function findPackageRoot(startDir: string): Promise<string> {
  let cur = path.resolve(startDir);
  for (let i = 0; i < 8; i++) {
    const pj = path.join(cur, 'package.json');
    if (await fs.pathExists(pj)) return cur;
    const parent = path.dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }
  return path.resolve(startDir);
}

async function installHookTemplates(repoRoot: string): Promise<string[]> {
  const hooksDir = path.join(repoRoot, HOOKS_DIR);
  await fs.ensureDir(hooksDir);

  const packageRoot = await findPackageRoot(__dirname);
  const templateDir = path.join(packageRoot, 'assets', 'hooks');
  const installed: string[] = [];
  for (const name of HOOK_NAMES) {
    const dst = path.join(hooksDir, name);
    await fs.copyFile(path.join(templateDir, name), dst);
    if (process.platform !== 'win32') await fs.chmod(dst, 0o755);
    installed.push(name);
  }
  return installed;
}

async function presentHooks(repoRoot: string): Promise<string[]> {
  const present: string[] = [];
  for (const name of HOOK_NAMES) {
    if (await fs.pathExists(path.join(repoRoot, HOOKS_DIR, name))) present.push(name);
  }
  return present;
}

function notARepo(repoRoot: string): CLIError {
  return error(ErrorReasons.NOT_A_GIT_REPO, { repoRoot, message: 'Not a git repository', hint: ErrorHints.NOT_A_GIT_REPO });
}

export async function handleInstallHooks(input: HooksInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'hooks:install' });
  const startedAt = Date.now();

  try {
    const repoRoot = await resolveGitRoot(path.resolve(input.path));
    if (!(await isGitRepo(repoRoot))) {
      log.error('hooks:install', { ok: false, error: ErrorReasons.NOT_A_GIT_REPO, repoRoot });
      return notARepo(repoRoot);
    }
    const installed = await installHookTemplates(repoRoot);
    runGit(repoRoot, ['config', 'core.hooksPath', HOOKS_DIR]);
    const hooksPath = getGitConfig(repoRoot, 'core.hooksPath');

    log.info('hooks_install', {
      ok: true,
      repoRoot,
      hooksPath,
      installed,
      duration_ms: Date.now() - startedAt,
    });

    return success({ repoRoot, hooksPath, installed });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error('hooks:install', { ok: false, err: message });
    return error(ErrorReasons.HOOKS_INSTALL_FAILED, { message });
  }
}

export async function handleUninstallHooks(input: HooksInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'hooks:uninstall' });
  const startedAt = Date.now();

  try {
    const repoRoot = await resolveGitRoot(path.resolve(input.path));
    if (!(await isGitRepo(repoRoot))) {
      log.error('hooks:uninstall', { ok: false, error: ErrorReasons.NOT_A_GIT_REPO, repoRoot });
      return notARepo(repoRoot);
    }
    spawnSync('git', ['config', '--unset', 'core.hooksPath'], { cwd: repoRoot, stdio: 'ignore' });
    const hooksPath = getGitConfig(repoRoot, 'core.hooksPath');

    log.info('hooks_uninstall', {
      ok: true,
      repoRoot,
      hooksPath,
      duration_ms: Date.now() - startedAt,
    });

    return success({ repoRoot, hooksPath });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error('hooks:uninstall', { ok: false, err: message });
    return error(ErrorReasons.HOOKS_UNINSTALL_FAILED, { message });
  }
}

export async function handleHooksStatus(input: HooksInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'hooks:status' });
  const startedAt = Date.now();

  try {
    const repoRoot = await resolveGitRoot(path.resolve(input.path));
    if (!(await isGitRepo(repoRoot))) {
      log.error('hooks:status', { ok: false, error: ErrorReasons.NOT_A_GIT_REPO, repoRoot });
      return notARepo(repoRoot);
    }
    const hooksPath = getGitConfig(repoRoot, 'core.hooksPath');
    const present = await presentHooks(repoRoot);

    log.info('hooks_status', {
      ok: true,
      repoRoot,
      hooksPath,
      duration_ms: Date.now() - startedAt,
    });

    return success({
      repoRoot,
      hooksPath,
      expected: HOOKS_DIR,
      present,
      installed: hooksPath === HOOKS_DIR && present.length === HOOK_NAMES.length,
    });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error('hooks:status', { ok: false, err: message });
    return error(ErrorReasons.HOOKS_STATUS_FAILED, { message });
  }
}
