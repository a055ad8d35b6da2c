import { Command } from 'commander';
import { registerDiaryCommands } from './commands/diary.js';

const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('workout-diary')
    .description('Workout diary — log sessions per author, search and summarize them')
    .version(VERSION)
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Enable verbose logging');

  registerDiaryCommands(program);

  return program;
}
