import { Command } from 'commander';
import { executeHandler } from '../types';

type HooksAction = 'install' | 'uninstall' | 'status';

function hooksSubcommand(action: HooksAction, description: string): Command {
  return new Command(action)
    .description(description)
    .option('-p, --path <path>', 'Path inside the repository', '.')
    .action(async (options) => {
      await executeHandler(`hooks:${action}`, options);
    });
}

export const hooksCommand = new Command('hooks')
  .description('Manage the pre-commit dependency check')
  .addCommand(hooksSubcommand('install', 'Write .githooks/pre-commit and point core.hooksPath at .githooks'))
  .addCommand(hooksSubcommand('uninstall', 'Unset core.hooksPath, leaving .githooks in place'))
  .addCommand(hooksSubcommand('status', 'Show whether the pre-commit hook is active'));
