import { z } from 'zod/v4';
import { isBlank } from '@shared/lib/validate.js';

// ── Author ───────────────────────────────────────────────────────────────────

const AUTHOR_NAME_ERROR = 'Name of author cannot be null or blank';
const AUTHOR_ID_ERROR = 'Author ID cannot be less than 1';

/** Non-blank display name. Stored as given; names are not trimmed. */
export const AuthorNameSchema = z
  .string({ error: AUTHOR_NAME_ERROR })
  .refine((name) => !isBlank(name), AUTHOR_NAME_ERROR);

export const AuthorIdSchema = z
  .number({ error: AUTHOR_ID_ERROR })
  .int('Author ID must be a whole number')
  .min(1, AUTHOR_ID_ERROR);

export const AuthorSnapshotSchema = z.object({
  id: AuthorIdSchema,
  name: AuthorNameSchema,
});

export type AuthorSnapshot = z.infer<typeof AuthorSnapshotSchema>;
