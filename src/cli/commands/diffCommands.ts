import { Command, Option } from 'commander';
import { SEVERITIES } from '../../core/manifest/types';
import { executeHandler } from '../types';

export const diffCommand = new Command('diff')
  .description('Compare the dependency tables of two revisions of a Cargo manifest')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('-m, --manifest <file>', 'Manifest path relative to the repository root (default: Cargo.toml)')
  .option('-b, --before <rev>', 'Revision to compare from', 'HEAD')
  .option('-a, --after <rev>', 'Revision to compare to: a commit-ish, worktree, staged or file:<path> (default: worktree)')
  .option('--staged', 'Compare HEAD with the staged manifest', false)
  .option('--dev', 'Include dev-dependencies')
  .option('--no-dev', 'Ignore dev-dependencies')
  .option('--build', 'Include build-dependencies')
  .option('--no-build', 'Ignore build-dependencies')
  .addOption(new Option('--min-severity <severity>', 'Hide version changes below this severity').choices(SEVERITIES))
  .addOption(new Option('--fail-on <severity>', 'Exit with code 3 when a change reaches this severity').choices(SEVERITIES))
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (options) => {
    await executeHandler('diff', options);
  });

export const inspectCommand = new Command('inspect')
  .description('List the dependencies declared by one revision of a Cargo manifest')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('-m, --manifest <file>', 'Manifest path relative to the repository root (default: Cargo.toml)')
  .option('-r, --rev <rev>', 'Revision to read', 'worktree')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (options) => {
    await executeHandler('inspect', options);
  });
