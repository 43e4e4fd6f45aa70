import type { HandlerRegistration } from './types';
import { defineHandler } from './types';
import { DiffSchema, InspectSchema } from './schemas/diffSchemas';
import { handleDiff, handleInspect } from './handlers/diffHandlers';
import { HooksSchema } from './schemas/hooksSchemas';
import { handleInstallHooks, handleUninstallHooks, handleHooksStatus } from './handlers/hooksHandlers';

/**
 * Registry of all CLI command handlers
 *
 * Command keys follow the pattern:
 * - Top-level commands: 'diff', 'inspect'
 * - Subcommands: 'hooks:install', 'hooks:status'
 */
export const cliHandlers: Record<string, HandlerRegistration> = {
  'diff': defineHandler(DiffSchema, (input) => handleDiff(input)),
  'inspect': defineHandler(InspectSchema, (input) => handleInspect(input)),
  'hooks:install': defineHandler(HooksSchema, handleInstallHooks),
  'hooks:uninstall': defineHandler(HooksSchema, handleUninstallHooks),
  'hooks:status': defineHandler(HooksSchema, handleHooksStatus),
};
