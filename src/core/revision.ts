import path from 'path';
import fs from 'fs-extra';
import { gitShow, toGitPath } from './git';
import { createLogger } from './log';

export interface RetrievalError {
  reason: 'retrieval_failed';
  revision: string;
  message: string;
}

export type RevisionText = { ok: true; text: string } | { ok: false; error: RetrievalError };

/** Supplies manifest text for an opaque revision reference. */
export interface RevisionContentProvider {
  getManifestText(revision: string): Promise<RevisionText>;
}

export const WORKTREE_REVISION = 'worktree';
export const STAGED_REVISION = 'staged';

export function isWorktreeRevision(revision: string): boolean {
  return revision === WORKTREE_REVISION || revision === 'WORKTREE';
}

export function isStagedRevision(revision: string): boolean {
  return revision === STAGED_REVISION || revision === 'INDEX';
}

const FILE_PREFIX = 'file:';

function failure(revision: string, message: string): RevisionText {
  return { ok: false, error: { reason: 'retrieval_failed', revision, message } };
}

/**
 * Reads the manifest from the working copy, the index, or any commit-ish.
 * `manifestPath` is relative to `repoRoot`. A `file:<path>` revision reads
 * that file as is, relative to the current directory.
 */
export function createGitRevisionProvider(repoRoot: string, manifestPath: string): RevisionContentProvider {
  const log = createLogger({ component: 'git', manifest: manifestPath });
  const gitPath = toGitPath(manifestPath);

  return {
    async getManifestText(revision: string): Promise<RevisionText> {
      if (revision.startsWith(FILE_PREFIX)) {
        const file = path.resolve(revision.slice(FILE_PREFIX.length));
        if (!(await fs.pathExists(file))) return failure(revision, `${file} does not exist`);
        return { ok: true, text: await fs.readFile(file, 'utf-8') };
      }
      if (isWorktreeRevision(revision)) {
        const file = path.join(repoRoot, manifestPath);
        if (!(await fs.pathExists(file))) return failure(revision, `${manifestPath} not found in the working copy`);
        return { ok: true, text: await fs.readFile(file, 'utf-8') };
      }

      const spec = isStagedRevision(revision) ? `:${gitPath}` : `${revision}:${gitPath}`;
      try {
        const text = await log.span('git_show', { revision, spec }, () => gitShow(repoRoot, spec));
        return { ok: true, text };
      } catch (e) {
        const message = e instanceof Error ? e.message.trim() : String(e);
        return failure(revision, `could not read ${gitPath} at ${revision}: ${message}`);
      }
    },
  };
}
