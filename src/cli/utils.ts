import { Command } from 'commander';
import type { IAuthorRegister } from '@domain/ports/author-register.js';
import type { IDiaryRegister } from '@domain/ports/diary-register.js';
import type { DiaryConfig } from '@domain/types/config.js';
import { IdAllocator } from '@domain/services/id-allocator.js';
import { AuthorRegister } from '@infra/registries/author-register.js';
import { DiaryRegister } from '@infra/registries/diary-register.js';
import { loadConfig } from '@infra/config/env-config.js';
import { SampleSeeder } from '@features/sample-diary/sample-seeder.js';
import { InvalidArgumentError } from '@shared/lib/errors.js';
import { setLoggerOptions } from '@shared/lib/logger.js';

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
}

/** The registers a command works on. They live for one CLI invocation. */
export interface DiaryContext {
  authors: IAuthorRegister;
  diary: IDiaryRegister;
}

export interface CommandContext extends DiaryContext {
  globalOpts: GlobalOptions;
  config: DiaryConfig;
  cmd: Command;
}

type CommandHandler = (ctx: CommandContext, ...args: string[]) => void | Promise<void>;

/**
 * Extract global CLI options from a Commander command.
 * `json` is also switched on by WORKOUT_DIARY_OUTPUT=json (merged later in
 * withCommandContext); the flag always wins.
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals<{ json?: boolean; verbose?: boolean }>();
  return { json: !!opts.json, verbose: !!opts.verbose };
}

/** Build fresh registers, seeded with the sample diary when the config asks for it. */
export function createDiaryContext(config: DiaryConfig): DiaryContext {
  const authors = new AuthorRegister();
  const diary = new DiaryRegister();
  if (config.sampleData) {
    new SampleSeeder(authors, diary, new IdAllocator()).seed();
  }
  return { authors, diary };
}

/**
 * Wrap a CLI command handler with standard boilerplate:
 * loads config, configures the logger, builds the registers, catches errors.
 *
 * Commander's .action() callback receives (...positionalArgs, localOpts, cmd).
 * The wrapper strips the last two, passes cmd via context, and forwards positional args.
 */
export function withCommandContext(
  handler: CommandHandler,
): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const cmd = args[args.length - 1];
    if (!(cmd instanceof Command)) {
      throw new TypeError('withCommandContext: expected the Commander command as the last argument');
    }
    const positionalArgs = args.slice(0, -2).filter((arg): arg is string => typeof arg === 'string');
    const globalOpts = getGlobalOptions(cmd);

    try {
      const config = loadConfig();
      setLoggerOptions({
        level: globalOpts.verbose ? 'debug' : config.log.level,
        json: config.log.json,
      });

      const json = globalOpts.json || config.outputMode === 'json';
      const ctx: CommandContext = {
        ...createDiaryContext(config),
        globalOpts: { ...globalOpts, json },
        config,
        cmd,
      };
      await handler(ctx, ...positionalArgs);
    } catch (error) {
      handleCommandError(error, globalOpts.verbose);
    }
  };
}

/**
 * Centralized error handler for CLI commands.
 * Prints the error message, and optionally the stack trace if verbose is enabled.
 */
export function handleCommandError(error: unknown, verbose: boolean): void {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}

/** Parse a CLI value as a positive integer. Throws on non-digit strings or non-positive values. */
export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  const n = Number(value.trim());
  if (n < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return n;
}

/** Parse a CLI value as a date (ISO-8601, e.g. 2026-03-01 or 2026-03-01T08:00:00Z). */
export function parseDate(value: string): Date {
  const date = new Date(value.trim());
  if (value.trim() === '' || Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`Expected an ISO-8601 date, got "${value}".`);
  }
  return date;
}
