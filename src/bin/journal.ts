#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { runJournalServer } from '../mcp/cli.js';
import { parseTagList } from '../journal/entry.js';
import {
  JournalError,
  ValidationError,
  hasErrorCode,
} from '../journal/errors.js';
import {
  filterByTags,
  fuzzySearchTitles,
  searchByTagExact,
  searchByTitleSubstring,
  stats,
} from '../journal/query/queryEngine.js';
import {
  DEFAULT_FUZZY_CUTOFF,
  DEFAULT_FUZZY_MAX_RESULTS,
} from '../journal/query/similarity.js';
import { loadSeedEntries } from '../journal/seed.js';
import { EntryStore } from '../journal/storage/entryStore.js';
import { JOURNAL_HOME_ENV, resolveJournalFile } from '../journal/storage/paths.js';
import type { JournalEntry, TagMatchMode } from '../journal/types.js';
import { logger } from '../logger.js';

interface RunCliOptions {
  readonly argv?: string[];
}

interface GlobalOptions {
  homePath?: string;
  json: boolean;
}

type CommandName =
  | 'add'
  | 'list'
  | 'search'
  | 'stats'
  | 'delete'
  | 'populate'
  | 'server'
  | 'help';

interface ParsedArguments {
  readonly command: CommandName;
  readonly global: GlobalOptions;
  readonly args: string[];
}

class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

const COMMANDS: readonly CommandName[] = [
  'add',
  'list',
  'search',
  'stats',
  'delete',
  'populate',
  'server',
  'help',
];

const isCommandName = (value: string): value is CommandName => {
  return COMMANDS.some((command) => command === value);
};

const parseArguments = (argv: string[]): ParsedArguments => {
  const global: GlobalOptions = { json: false };
  const rest: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === undefined) {
      throw new CliError('引数の解析に失敗しました。');
    }

    if (token === '--home') {
      const value = argv[index + 1];
      if (!value) {
        throw new CliError('--home の引数が不足しています。');
      }
      global.homePath = value;
      index += 1;
      continue;
    }

    if (token === '--json') {
      global.json = true;
      continue;
    }

    if (token === '--help' || token === '-h') {
      return { command: 'help', global, args: [] };
    }

    rest.push(token);
  }

  const [command, ...commandArgs] = rest;

  if (command === undefined) {
    return { command: 'help', global, args: [] };
  }

  if (isCommandName(command)) {
    return { command, global, args: commandArgs };
  }

  throw new CliError(`不明なコマンドです: ${command}`);
};

const applyGlobalOptions = (global: GlobalOptions): void => {
  if (global.homePath !== undefined) {
    process.env[JOURNAL_HOME_ENV] = global.homePath;
  }
};

const logJson = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};

const requireValue = (args: string[], index: number, option: string): string => {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliError(`${option} の引数が不足しています。`);
  }
  return value;
};

// 壊れたファイルは警告を出して空として続行する。
const loadEntries = async (store: EntryStore): Promise<JournalEntry[]> => {
  const outcome = await store.read();

  if (outcome.status === 'malformed') {
    console.error(`警告: ${outcome.error.message}`);
    console.error('エントリなしとして扱います。');
    return [];
  }

  if (outcome.status === 'invalid') {
    throw outcome.error;
  }

  return outcome.entries;
};

const formatTable = (rows: string[][]): string => {
  const header = rows[0];
  if (header === undefined) {
    return '（エントリがありません）';
  }

  const widths = header.map((_, column) =>
    Math.max(
      ...rows.map((row) => {
        const cell = row[column];
        return cell !== undefined ? cell.length : 0;
      }),
    ),
  );

  return rows
    .map((row) =>
      row
        .map((cellValue, index) => {
          const cell = cellValue ?? '';
          const width = widths[index] ?? 0;
          return cell.padEnd(width);
        })
        .join(' | ')
        .trimEnd(),
    )
    .join('\n');
};

const printEntries = (entries: readonly JournalEntry[]): void => {
  if (entries.length === 0) {
    console.log('（エントリがありません）');
    return;
  }

  const rows = [
    ['id', 'date', 'title', 'tags'],
    ...entries.map(({ id, date, title, tags }) => [
      id,
      date,
      title,
      tags.join(', '),
    ]),
  ];

  console.log(formatTable(rows));
  console.log(`合計: ${entries.length} 件`);
};

const handleAddCommand = async (
  store: EntryStore,
  args: string[],
  global: GlobalOptions,
): Promise<void> => {
  const positional: string[] = [];
  const tagValues: string[] = [];

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === undefined) {
      throw new CliError('add コマンドのパラメータが不正です。');
    }

    if (token === '--tags' || token === '--tag') {
      tagValues.push(requireValue(args, index, token));
      index += 1;
      continue;
    }

    if (token.startsWith('--')) {
      throw new CliError(`add コマンドで不明なオプションです: ${token}`);
    }

    positional.push(token);
  }

  const [title, content, ...extra] = positional;
  if (title === undefined || content === undefined) {
    throw new CliError('add には title と content を指定してください。');
  }

  if (extra.length > 0) {
    throw new CliError(`add コマンドの引数が多すぎます: ${extra.join(' ')}`);
  }

  const entry = await store.add(title, content, parseTagList(tagValues));

  if (global.json) {
    logJson(entry);
  } else {
    console.log(`追加しました: ${entry.id}`);
  }
};

const handleListCommand = async (
  store: EntryStore,
  args: string[],
  global: GlobalOptions,
): Promise<void> => {
  const tags: string[] = [];
  let match: TagMatchMode = 'any';

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--tag' || token === '--tags') {
      tags.push(...parseTagList(requireValue(args, index, token)));
      index += 1;
      continue;
    }

    if (token === '--all-tags') {
      match = 'all';
      continue;
    }

    throw new CliError(`list コマンドで不明なオプションです: ${token}`);
  }

  const entries = filterByTags(await loadEntries(store), tags, { match });

  if (global.json) {
    logJson(entries);
    return;
  }

  printEntries(entries);
};

const parseNumberOption = (value: string, option: string): number => {
  const parsed = Number(value);
  if (value.trim().length === 0 || Number.isNaN(parsed)) {
    throw new CliError(`${option} には数値を指定してください。`);
  }
  return parsed;
};

const handleSearchCommand = async (
  store: EntryStore,
  args: string[],
  global: GlobalOptions,
): Promise<void> => {
  let mode: 'title' | 'tag' | 'fuzzy' = 'title';
  let limit = DEFAULT_FUZZY_MAX_RESULTS;
  let cutoff = DEFAULT_FUZZY_CUTOFF;
  const positional: string[] = [];

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === undefined) {
      throw new CliError('search コマンドのパラメータが不正です。');
    }

    if (token === '--tags') {
      mode = 'tag';
      continue;
    }

    if (token === '--fuzzy') {
      mode = 'fuzzy';
      continue;
    }

    if (token === '--limit') {
      limit = parseNumberOption(requireValue(args, index, token), token);
      index += 1;
      continue;
    }

    if (token === '--cutoff') {
      cutoff = parseNumberOption(requireValue(args, index, token), token);
      index += 1;
      continue;
    }

    if (token.startsWith('--')) {
      throw new CliError(`search コマンドで不明なオプションです: ${token}`);
    }

    positional.push(token);
  }

  const query = positional.join(' ');
  if (query.trim().length === 0) {
    throw new CliError('search には検索語を指定してください。');
  }

  const entries = await loadEntries(store);

  if (mode === 'fuzzy') {
    let titles: string[];
    try {
      titles = fuzzySearchTitles(
        entries.map(({ title }) => title),
        query,
        limit,
        cutoff,
      );
    } catch (error: unknown) {
      if (error instanceof RangeError) {
        throw new CliError('--limit は正の整数、--cutoff は 0 以上 1 以下で指定してください。');
      }
      throw error;
    }

    if (global.json) {
      logJson(titles);
    } else if (titles.length === 0) {
      console.log(`"${query}" に近いタイトルは見つかりませんでした。`);
    } else {
      titles.forEach((title) => console.log(title));
    }
    return;
  }

  const found =
    mode === 'tag'
      ? searchByTagExact(entries, query)
      : searchByTitleSubstring(entries, query);

  if (global.json) {
    logJson(found);
    return;
  }

  printEntries(found);
};

const formatAverage = (value: number | null): string => {
  return value === null ? '-' : value.toFixed(2);
};

const handleStatsCommand = async (
  store: EntryStore,
  args: string[],
  global: GlobalOptions,
): Promise<void> => {
  if (args.length > 0) {
    throw new CliError(`stats コマンドで不明なオプションです: ${args.join(' ')}`);
  }

  const summary = stats(await loadEntries(store));

  if (global.json) {
    logJson(summary);
    return;
  }

  console.log(`Total entries: ${summary.count}`);
  console.log(`Total tags: ${summary.distinctTagCount}`);
  console.log(`Most common tag: ${summary.mostCommonTag ?? '-'}`);
  console.log(`Total words: ${summary.totalWords}`);
  console.log(`Average words per entry: ${formatAverage(summary.avgWordsPerEntry)}`);
};

const handleDeleteCommand = async (
  store: EntryStore,
  args: string[],
  global: GlobalOptions,
): Promise<void> => {
  const [id, ...extra] = args;
  if (!id || id.startsWith('--')) {
    throw new CliError('delete には削除する id を指定してください。');
  }

  if (extra.length > 0) {
    throw new CliError(`delete コマンドの引数が多すぎます: ${extra.join(' ')}`);
  }

  await store.delete(id);

  if (global.json) {
    logJson({ deletedId: id });
  } else {
    console.log(`削除しました: ${id}`);
  }
};

const handlePopulateCommand = async (
  store: EntryStore,
  args: string[],
  global: GlobalOptions,
): Promise<void> => {
  let filePath: string | undefined;

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--file') {
      filePath = requireValue(args, index, token);
      index += 1;
      continue;
    }

    throw new CliError(`populate コマンドで不明なオプションです: ${token}`);
  }

  const seeds = await loadSeedEntries(filePath);
  const added: JournalEntry[] = [];
  const failed: Array<{ title: string; reason: string }> = [];

  for (const seed of seeds) {
    try {
      added.push(await store.add(seed.title, seed.content, seed.tags));
    } catch (error: unknown) {
      if (error instanceof ValidationError) {
        failed.push({ title: seed.title, reason: error.message });
        continue;
      }
      throw error;
    }
  }

  if (global.json) {
    logJson({ addedIds: added.map(({ id }) => id), failed });
  } else {
    added.forEach(({ title }) => console.log(`追加しました: ${title}`));
    failed.forEach(({ title, reason }) =>
      console.error(`追加できませんでした: ${title} (${reason})`),
    );
  }

  if (failed.length > 0) {
    process.exitCode = 1;
  }
};

const handleServerCommand = async (
  store: EntryStore,
  args: string[],
): Promise<void> => {
  if (args.length > 0) {
    throw new CliError(`server コマンドで不明なオプションです: ${args.join(' ')}`);
  }

  await runJournalServer({ store });
};

const printHelp = (): void => {
  console.log(`Usage: journal [global options] <command> [options]

Commands:
  add <title> <content> [--tags <a,b>]...   エントリを追加します。
  list [--tag <tag>]... [--all-tags]        エントリを一覧表示します。既定はいずれかのタグに一致するもの。
  search <query> [--tags | --fuzzy]         タイトルの部分一致・タグの完全一致・あいまい検索を行います。
         [--limit <n>] [--cutoff <0-1>]     あいまい検索の件数と類似度のしきい値。
  stats                                     統計を表示します。
  delete <id>                               エントリを削除します。
  populate [--file <path>]                  シードファイルのエントリをまとめて追加します。
  server                                    MCP サーバーを stdio で起動します。

Global options:
  --home <path>   データディレクトリを上書きします。
  --json          出力を JSON 形式に固定します。
`);
};

const handleError = (error: unknown): void => {
  process.exitCode = 1;

  if (error instanceof CliError || error instanceof JournalError) {
    console.error(error.message);
    return;
  }

  if (error instanceof Error) {
    logger.error({ err: error }, 'unexpected error');
    console.error('[journal] 予期しないエラーが発生しました:', error.message);
    return;
  }

  console.error('[journal] 予期しないエラーが発生しました。');
};

export const runCli = async (
  options: RunCliOptions = {},
): Promise<void> => {
  const argv = options.argv ?? process.argv.slice(2);

  let parsed: ParsedArguments;
  try {
    parsed = parseArguments(argv);
  } catch (error: unknown) {
    handleError(error);
    return;
  }

  applyGlobalOptions(parsed.global);

  if (parsed.command === 'help') {
    printHelp();
    return;
  }

  const store = new EntryStore({ filePath: resolveJournalFile(), logger });

  try {
    switch (parsed.command) {
      case 'add':
        await handleAddCommand(store, parsed.args, parsed.global);
        break;
      case 'list':
        await handleListCommand(store, parsed.args, parsed.global);
        break;
      case 'search':
        await handleSearchCommand(store, parsed.args, parsed.global);
        break;
      case 'stats':
        await handleStatsCommand(store, parsed.args, parsed.global);
        break;
      case 'delete':
        await handleDeleteCommand(store, parsed.args, parsed.global);
        break;
      case 'populate':
        await handlePopulateCommand(store, parsed.args, parsed.global);
        break;
      case 'server':
        await handleServerCommand(store, parsed.args);
        break;
    }
  } catch (error: unknown) {
    handleError(error);
  }
};

// npm の bin はシンボリックリンク経由で起動される。
const resolveInvokedFile = (invoked: string): string => {
  const resolved = path.resolve(invoked);
  try {
    return realpathSync(resolved);
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) {
      return resolved;
    }
    throw error;
  }
};

const isExecutedDirectly = (): boolean => {
  const invoked = process.argv[1];
  if (invoked === undefined) {
    return false;
  }

  return resolveInvokedFile(invoked) === fileURLToPath(import.meta.url);
};

if (isExecutedDirectly()) {
  runCli().catch((error: unknown) => {
    handleError(error);
  });
}
