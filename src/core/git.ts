import simpleGit from 'simple-git';
import path from 'path';

export async function resolveGitRoot(startDir: string): Promise<string> {
  const resolved = path.resolve(startDir);
  try {
    const git = simpleGit(resolved);
    const root = await git.raw(['rev-parse', '--show-toplevel']);
    return root.trim();
  } catch {
    return resolved;
  }
}

export async function isGitRepo(dir: string): Promise<boolean> {
  try {
    return await simpleGit(dir).checkIsRepo();
  } catch {
    return false;
  }
}

/** `git show <spec>`; spec is `<rev>:<path>` or `:<path>` for the index. */
export async function gitShow(repoRoot: string, spec: string): Promise<string> {
  return simpleGit(repoRoot).raw(['show', spec]);
}

export function toGitPath(p: string): string {
  return p.split(path.sep).join('/');
}
