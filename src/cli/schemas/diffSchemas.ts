import { z } from 'zod';
import { SEVERITIES } from '../../core/manifest/types';

export const SeveritySchema = z.enum(SEVERITIES);

export const DiffSchema = z.object({
  path: z.string().default('.'),
  manifest: z.string().min(1).optional(),
  before: z.string().min(1).default('HEAD'),
  after: z.string().min(1).optional(),
  staged: z.boolean().default(false),
  // commander leaves these undefined unless --dev/--no-dev (--build/--no-build) is given
  dev: z.boolean().optional(),
  build: z.boolean().optional(),
  minSeverity: SeveritySchema.optional(),
  failOn: SeveritySchema.optional(),
  json: z.boolean().default(false),
});

export type DiffInput = z.infer<typeof DiffSchema>;

export const InspectSchema = z.object({
  path: z.string().default('.'),
  manifest: z.string().min(1).optional(),
  rev: z.string().min(1).default('worktree'),
  json: z.boolean().default(false),
});

export type InspectInput = z.infer<typeof InspectSchema>;
