import type { Command } from 'commander';
import { withCommandContext, parsePositiveInt, parseDate } from '@cli/utils.js';
import {
  formatEntryList,
  formatEntryListJson,
  formatAuthorTable,
  formatAuthorTableJson,
  formatTotals,
  formatTotalsJson,
} from '@cli/formatters/diary-formatter.js';
import { AuthorNotFoundError } from '@shared/lib/errors.js';

export function registerDiaryCommands(parent: Command): void {
  // workout-diary show
  parent
    .command('show')
    .description('Show every diary entry, newest first')
    .action(withCommandContext((ctx) => {
      const entries = ctx.diary.getSortedEntries();
      console.log(ctx.globalOpts.json ? formatEntryListJson(entries) : formatEntryList(entries));
    }));

  // workout-diary authors [--name <name>]
  parent
    .command('authors')
    .description('List authors, or find authors by exact name (case-insensitive)')
    .option('--name <name>', 'Author name to search for')
    .action(withCommandContext((ctx) => {
      const { name } = ctx.cmd.opts<{ name?: string }>();
      const authors = name === undefined
        ? ctx.authors.getAllAuthors()
        : ctx.authors.searchAuthorByName(name);
      console.log(ctx.globalOpts.json ? formatAuthorTableJson(authors) : formatAuthorTable(authors));
    }));

  // workout-diary entries --author <id>
  parent
    .command('entries')
    .description("List one author's entries in the order they were written")
    .requiredOption('--author <id>', 'Author ID', parsePositiveInt)
    .action(withCommandContext((ctx) => {
      const { author: authorId } = ctx.cmd.opts<{ author: number }>();
      const author = ctx.authors.getAuthorById(authorId);
      if (!author) {
        throw new AuthorNotFoundError(authorId);
      }
      const entries = ctx.diary.getAllEntriesByAuthor(author);
      console.log(
        ctx.globalOpts.json
          ? formatEntryListJson(entries)
          : formatEntryList(entries, `Entries by ${author.toString()}`),
      );
    }));

  // workout-diary search <word>
  parent
    .command('search')
    .description('Find entries whose diary text contains a word (case-insensitive)')
    .argument('<word>', 'Word or phrase to look for')
    .action(withCommandContext((ctx, word) => {
      const entries = ctx.diary.searchEntryByWord(word);
      console.log(
        ctx.globalOpts.json ? formatEntryListJson(entries) : formatEntryList(entries, `Entries matching "${word}"`),
      );
    }));

  // workout-diary between <from> <to>
  parent
    .command('between')
    .description('Find entries created strictly between two dates')
    .argument('<from>', 'Start date (ISO-8601)')
    .argument('<to>', 'End date (ISO-8601)')
    .action(withCommandContext((ctx, from, to) => {
      const entries = ctx.diary.searchByDate(parseDate(from), parseDate(to));
      console.log(
        ctx.globalOpts.json ? formatEntryListJson(entries) : formatEntryList(entries, `Entries between ${from} and ${to}`),
      );
    }));

  // workout-diary stats
  parent
    .command('stats')
    .description('Count entries per author')
    .action(withCommandContext((ctx) => {
      const totals = ctx.diary.getTotalEntriesByAuthors();
      console.log(ctx.globalOpts.json ? formatTotalsJson(totals) : formatTotals(totals));
    }));
}
