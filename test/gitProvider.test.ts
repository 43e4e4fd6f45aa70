import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'path';
import simpleGit from 'simple-git';
import { handleDiff } from '../src/cli/handlers/diffHandlers';
import { DiffSchema } from '../src/cli/schemas/diffSchemas';
import { resolveGitRoot } from '../src/core/git';
import { setLogLevel } from '../src/core/log';
import { createGitRevisionProvider } from '../src/core/revision';
import { createTempDir, manifest } from './helpers';

setLogLevel(null);

const COMMITTED = manifest('[dependencies]\nserde = "1.0.217"\n');
const STAGED = manifest('[dependencies]\nserde = "1.0.219"\n');
const WORKING = manifest('[dependencies]\nserde = "2.0.0"\nnom = "7.1.3"\n');

async function initRepo(): Promise<string> {
  const repoRoot = await createTempDir('git');
  const git = simpleGit(repoRoot);
  await git.init();
  await git.addConfig('user.name', 'Test User');
  await git.addConfig('user.email', 'test@example.com');
  await git.addConfig('commit.gpgsign', 'false');

  await fs.writeFile(path.join(repoRoot, 'Cargo.toml'), COMMITTED);
  await git.add('Cargo.toml');
  await git.commit('initial manifest');

  await fs.writeFile(path.join(repoRoot, 'Cargo.toml'), STAGED);
  await git.add('Cargo.toml');
  await fs.writeFile(path.join(repoRoot, 'Cargo.toml'), WORKING);
  return repoRoot;
}

test('the git provider reads HEAD, the index and the working copy', async () => {
  const repoRoot = await initRepo();
  const provider = createGitRevisionProvider(repoRoot, 'Cargo.toml');

  assert.deepEqual(await provider.getManifestText('HEAD'), { ok: true, text: COMMITTED });
  assert.deepEqual(await provider.getManifestText('staged'), { ok: true, text: STAGED });
  assert.deepEqual(await provider.getManifestText('INDEX'), { ok: true, text: STAGED });
  assert.deepEqual(await provider.getManifestText('worktree'), { ok: true, text: WORKING });

  const other = path.join(repoRoot, 'other.toml');
  await fs.writeFile(other, COMMITTED);
  assert.deepEqual(await provider.getManifestText(`file:${other}`), { ok: true, text: COMMITTED });
});

test('unknown revisions and missing files are retrieval errors', async () => {
  const repoRoot = await initRepo();

  const unknown = await createGitRevisionProvider(repoRoot, 'Cargo.toml').getManifestText('no-such-branch');
  assert.equal(unknown.ok, false);
  if (!unknown.ok) {
    assert.equal(unknown.error.reason, 'retrieval_failed');
    assert.equal(unknown.error.revision, 'no-such-branch');
    assert.match(unknown.error.message, /^could not read Cargo\.toml at no-such-branch: /);
  }

  const missing = await createGitRevisionProvider(repoRoot, 'crates/app/Cargo.toml').getManifestText('worktree');
  assert.deepEqual(missing, {
    ok: false,
    error: { reason: 'retrieval_failed', revision: 'worktree', message: 'crates/app/Cargo.toml not found in the working copy' },
  });
});

test('diff runs end to end against a repository', async () => {
  const repoRoot = await initRepo();
  const nested = path.join(repoRoot, 'src');
  await fs.ensureDir(nested);
  assert.equal(await fs.realpath(await resolveGitRoot(nested)), await fs.realpath(repoRoot));

  const staged = await handleDiff(DiffSchema.parse({ path: nested, staged: true }), { env: {} });
  assert.equal(staged.ok, true);
  assert.equal(staged.textOutput, '🔧 bump serde from 1.0.217 to 1.0.219');

  const working = await handleDiff(DiffSchema.parse({ path: nested, failOn: 'major' }), { env: {} });
  assert.equal(working.ok, true);
  assert.equal(working.textOutput, ['✨ add nom 7.1.3', '❗ bump serde from 1.0.217 to 2.0.0'].join('\n'));
  assert.equal(working.exitCode, 3);
});
