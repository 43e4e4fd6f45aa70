import { z } from 'zod';

/** Shared by `hooks install`, `hooks uninstall` and `hooks status`. */
export const HooksSchema = z.object({
  path: z.string().default('.'),
});

export type HooksInput = z.infer<typeof HooksSchema>;
