import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '@shared/lib/errors.js';
import { loadConfig } from './env-config.js';

describe('loadConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      log: { level: 'info', json: false },
      outputMode: 'text',
      sampleData: true,
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      WORKOUT_DIARY_LOG_LEVEL: 'DEBUG',
      WORKOUT_DIARY_LOG_JSON: 'true',
      WORKOUT_DIARY_OUTPUT: 'json',
      WORKOUT_DIARY_SAMPLE_DATA: '0',
    });
    expect(config).toEqual({
      log: { level: 'debug', json: true },
      outputMode: 'json',
      sampleData: false,
    });
  });

  it('treats empty strings as unset', () => {
    expect(loadConfig({ WORKOUT_DIARY_LOG_LEVEL: '', WORKOUT_DIARY_SAMPLE_DATA: '' }).log.level).toBe('info');
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ WORKOUT_DIARY_LOG_LEVEL: 'verbose' })).toThrow(
      'Invalid diary configuration (log.level)',
    );
  });

  it('rejects an unknown output mode', () => {
    expect(() => loadConfig({ WORKOUT_DIARY_OUTPUT: 'xml' })).toThrow(InvalidArgumentError);
  });

  it('rejects a malformed flag', () => {
    expect(() => loadConfig({ WORKOUT_DIARY_SAMPLE_DATA: 'maybe' })).toThrow(
      'WORKOUT_DIARY_SAMPLE_DATA must be one of 1, 0, true, false; got "maybe"',
    );
  });
});
