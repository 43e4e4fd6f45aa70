#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { setLogLevel } from '../src/core/log';
import { diffCommand, inspectCommand } from '../src/cli/commands/diffCommands';
import { hooksCommand } from '../src/cli/commands/hooksCommands';

const VERBOSE_FLAGS = new Set(['-V', '--verbose']);
const QUIET_FLAGS = new Set(['-q', '--quiet']);

function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (let i = 0; i < 10; i++) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function readVersionFromPackageJson(): string {
  const pkgPath = findPackageJson(__dirname);
  if (!pkgPath) return '0.0.0';
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/** Verbosity flags are accepted anywhere on the command line. */
function applyVerbosity(argv: string[]): string[] {
  const rest: string[] = [];
  for (const arg of argv) {
    if (VERBOSE_FLAGS.has(arg)) setLogLevel('debug');
    else if (QUIET_FLAGS.has(arg)) setLogLevel(null);
    else rest.push(arg);
  }
  return rest;
}

function main() {
  const argv = applyVerbosity(process.argv);

  const program = new Command();
  program
    .name('manifest-diff')
    .description('Report dependency changes between two revisions of a Cargo manifest')
    .version(readVersionFromPackageJson(), '-v, --version')
    .option('-V, --verbose', 'Write debug logs to stderr')
    .option('-q, --quiet', 'Write no logs');

  program.addCommand(diffCommand);
  program.addCommand(inspectCommand);
  program.addCommand(hooksCommand);
  program.parse(argv);
}

main();
