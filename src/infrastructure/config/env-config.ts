import { DiaryConfigSchema, type DiaryConfig } from '@domain/types/config.js';
import { InvalidArgumentError } from '@shared/lib/errors.js';

export const ENV_KEYS = {
  logLevel: 'WORKOUT_DIARY_LOG_LEVEL',
  logJson: 'WORKOUT_DIARY_LOG_JSON',
  output: 'WORKOUT_DIARY_OUTPUT',
  sampleData: 'WORKOUT_DIARY_SAMPLE_DATA',
} as const;

type Env = Record<string, string | undefined>;

function parseFlag(key: string, raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === '') return undefined;
  const value = raw.trim().toLowerCase();
  if (value === '1' || value === 'true') return true;
  if (value === '0' || value === 'false') return false;
  throw new InvalidArgumentError(`${key} must be one of 1, 0, true, false; got "${raw}"`);
}

/**
 * Build the diary configuration from environment variables.
 * Unset variables fall back to the schema defaults.
 * @throws InvalidArgumentError if a variable holds an unsupported value
 */
export function loadConfig(env: Env = process.env): DiaryConfig {
  const level = env[ENV_KEYS.logLevel]?.trim().toLowerCase() || undefined;
  const output = env[ENV_KEYS.output]?.trim().toLowerCase() || undefined;

  const result = DiaryConfigSchema.safeParse({
    log: {
      level,
      json: parseFlag(ENV_KEYS.logJson, env[ENV_KEYS.logJson]),
    },
    outputMode: output,
    sampleData: parseFlag(ENV_KEYS.sampleData, env[ENV_KEYS.sampleData]),
  });

  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.map(String).join('.')).join(', ');
    throw new InvalidArgumentError(`Invalid diary configuration (${fields})`, result.error.issues);
  }
  return result.data;
}
