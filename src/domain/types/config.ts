import { z } from 'zod/v4';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const OutputModeSchema = z.enum(['text', 'json']);
export type OutputMode = z.infer<typeof OutputModeSchema>;

export const DiaryConfigSchema = z.object({
  log: z.object({
    level: LogLevelSchema.default('info'),
    /** Emit log lines as JSON objects on stderr. */
    json: z.boolean().default(false),
  }).default(() => ({ level: 'info' as const, json: false })),
  /**
   * CLI output format.
   * - 'text' (default): human-readable listings
   * - 'json': entry and author snapshots as JSON
   * The --json flag always wins.
   */
  outputMode: OutputModeSchema.default('text'),
  /** Seed the registers with the bundled sample diary on start-up. */
  sampleData: z.boolean().default(true),
});

export type DiaryConfig = z.infer<typeof DiaryConfigSchema>;
