import { z, type ZodType, type ZodTypeDef } from 'zod';
import { createLogger } from '../core/log';

/**
 * Standard CLI result interface for successful operations
 *
 * Machine-readable output format:
 * - ok: boolean indicating success/failure
 * - command: the command that was executed
 * - repoRoot: repository root path (when applicable)
 * - timestamp: ISO 8601 timestamp
 * - duration_ms: execution time in milliseconds
 *
 * `textOutput` replaces the JSON document on stdout when present, and
 * `exitCode` overrides the default of 0 (the diff gate uses 3).
 */
export interface CLIResult {
  ok: true;
  command?: string;
  repoRoot?: string;
  timestamp?: string;
  duration_ms?: number;
  textOutput?: string;
  exitCode?: number;
  [key: string]: unknown;
}

/**
 * Standard CLI error interface
 *
 * - ok: always false
 * - reason: machine-readable error code
 * - message: human-readable error description
 * - hint: optional suggestion for resolution
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  [key: string]: unknown;
}

export type CLIHandler<TInput> = (input: TInput) => Promise<CLIResult | CLIError>;

/**
 * A validated handler with its input type erased, so that differently
 * typed handlers can share one registry.
 */
export interface HandlerRegistration {
  run(rawInput: unknown): Promise<CLIResult | CLIError>;
}

export function defineHandler<TInput>(
  schema: ZodType<TInput, ZodTypeDef, unknown>,
  handler: CLIHandler<TInput>
): HandlerRegistration {
  return {
    run: async (rawInput) => handler(schema.parse(rawInput)),
  };
}

export const ExitCodes = {
  OK: 0,
  INVALID_INVOCATION: 1,
  HANDLER_FAILED: 2,
  GATE_FAILED: 3,
} as const;

/**
 * Execute a CLI handler with validation and error handling
 *
 * @param commandKey - Unique command identifier (e.g., 'diff', 'hooks:install')
 * @param rawInput - Raw input from Commander.js (arguments + options)
 *
 * @example
 * ```typescript
 * .action(async (options) => {
 *   await executeHandler('diff', options);
 * })
 * ```
 */
export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  const { cliHandlers } = await import('./registry');
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();

  const handler = cliHandlers[commandKey];
  if (!handler) {
    console.error(JSON.stringify(
      {
        ok: false,
        reason: 'unknown_command',
        command: commandKey,
        timestamp,
        hint: 'Run "manifest-diff --help" to see available commands',
      },
      null,
      2
    ));
    process.exit(ExitCodes.INVALID_INVOCATION);
    return;
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const result = await handler.run(rawInput);
    const duration_ms = Date.now() - startedAt;

    if (result.ok) {
      const { textOutput, exitCode, ...data } = result;
      if (textOutput !== undefined) {
        console.log(textOutput);
      } else {
        console.log(JSON.stringify({ ...data, command: commandKey, timestamp, duration_ms }, null, 2));
      }
      process.exit(exitCode ?? ExitCodes.OK);
    } else {
      const agentError = {
        ...result,
        command: commandKey,
        timestamp,
        duration_ms,
      };
      process.stderr.write(JSON.stringify(agentError, null, 2) + '\n');
      process.exit(ExitCodes.HANDLER_FAILED);
    }
  } catch (e) {
    const duration_ms = Date.now() - startedAt;

    if (e instanceof z.ZodError) {
      const errors = e.issues.map((err: z.ZodIssue) => ({
        path: err.path.join('.'),
        message: err.message,
        code: err.code,
      }));

      console.error(JSON.stringify(
        {
          ok: false,
          reason: ErrorReasons.VALIDATION_ERROR,
          message: 'Invalid command arguments',
          command: commandKey,
          timestamp,
          duration_ms,
          errors,
          hint: ErrorHints.VALIDATION_ERROR,
        },
        null,
        2
      ));
      process.exit(ExitCodes.INVALID_INVOCATION);
      return;
    }

    const errorDetails = e instanceof Error
      ? { name: e.name, message: e.message, stack: e.stack }
      : { message: String(e) };

    log.error(commandKey, { ok: false, err: errorDetails });

    console.error(JSON.stringify(
      {
        ok: false,
        reason: ErrorReasons.INTERNAL_ERROR,
        message: e instanceof Error ? e.message : String(e),
        command: commandKey,
        timestamp,
        duration_ms,
        hint: 'An unexpected error occurred. Run with --verbose for details.',
      },
      null,
      2
    ));
    process.exit(ExitCodes.INVALID_INVOCATION);
  }
}

/**
 * Create a success result
 */
export function success(data: Record<string, unknown>): CLIResult {
  return {
    ok: true,
    ...data,
  };
}

/**
 * Create an error result
 */
export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return {
    ok: false,
    reason,
    ...details,
  };
}

/**
 * Common error reasons for consistent machine handling
 */
export const ErrorReasons = {
  NOT_A_GIT_REPO: 'not_a_git_repo',
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
  CONFIG_INVALID: 'config_invalid',
  RETRIEVAL_FAILED: 'retrieval_failed',
  MALFORMED_MANIFEST: 'malformed_manifest',
  DUPLICATE_DEPENDENCY_KEY: 'duplicate_dependency_key',
  HOOKS_INSTALL_FAILED: 'hooks_install_failed',
  HOOKS_UNINSTALL_FAILED: 'hooks_uninstall_failed',
  HOOKS_STATUS_FAILED: 'hooks_status_failed',
} as const;

/**
 * Common hints for error resolution
 */
export const ErrorHints = {
  NOT_A_GIT_REPO: 'Initialize a git repository with "git init"',
  VALIDATION_ERROR: 'Check command syntax with --help',
  CONFIG_INVALID: 'Fix or remove .manifest-diff.json at the repository root',
  RETRIEVAL_FAILED: 'Check that the revision exists and contains the manifest, or pass --manifest',
  MALFORMED_MANIFEST: 'The manifest must be valid TOML with a [package] or [workspace] table',
  DUPLICATE_DEPENDENCY_KEY: 'Remove the repeated dependency so each table names it once',
} as const;
