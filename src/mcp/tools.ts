import { UserError, type Tool, type ToolParameters } from 'fastmcp';
import { z } from 'zod';
import { JournalError, MalformedStoreError } from '../journal/errors.js';
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
import type { EntryStore } from '../journal/storage/entryStore.js';

type MCPAuth = Record<string, unknown> | undefined;
type MCPTool = Tool<MCPAuth>;

export const addEntryParameters = z.object({
  title: z.string(),
  content: z.string(),
  tags: z.array(z.string()).optional(),
});

export const listEntriesParameters = z
  .object({
    tags: z.array(z.string()).optional(),
    match: z.enum(['any', 'all']).optional(),
  })
  .optional();

export const searchEntriesParameters = z.object({
  query: z.string(),
  mode: z.enum(['title', 'tag', 'fuzzy']).optional(),
  limit: z.number().int().positive().optional(),
  cutoff: z.number().min(0).max(1).optional(),
});

export const deleteEntryParameters = z.object({
  id: z.string().min(1),
});

const castSchema = <Schema extends z.ZodTypeAny>(
  schema: Schema,
): ToolParameters => {
  return schema as unknown as ToolParameters;
};

// ドメインエラーは利用者向けメッセージとして返す。
const runJournalOperation = async <T>(
  operation: () => Promise<T>,
): Promise<T> => {
  try {
    return await operation();
  } catch (error: unknown) {
    if (error instanceof JournalError) {
      throw new UserError(error.message);
    }

    throw error;
  }
};

/**
 * ジャーナル操作を MCP ツールとして公開する。ストアは呼び出し側で生成したものを使う。
 */
export const buildJournalTools = (store: EntryStore): MCPTool[] => {
  const loadEntries = async () => {
    const outcome = await store.read();
    if (outcome.status === 'invalid') {
      throw outcome.error;
    }
    return outcome;
  };

  const warningsOf = (error: MalformedStoreError | undefined): string[] => {
    return error ? [error.message] : [];
  };

  const addEntryTool: MCPTool = {
    name: 'addEntry',
    description: `ジャーナルにエントリを 1 件追加する。
title は 50 文字以内、content は 200 文字以内。tags は任意の文字列配列で、前後の空白は取り除かれる。
追加したエントリ { id, title, content, date, tags } を返す。`,
    parameters: castSchema(addEntryParameters),
    execute: async (args) => {
      const parsed = addEntryParameters.parse(args);
      const entry = await runJournalOperation(() =>
        store.add(parsed.title, parsed.content, parsed.tags ?? []),
      );
      return JSON.stringify(entry);
    },
  };

  const listEntriesTool: MCPTool = {
    name: 'listEntries',
    description: `保存済みエントリを登録順に返す。
tags を指定すると大文字小文字を区別せずに絞り込む。match が any（既定）ならいずれかのタグ、all ならすべてのタグを持つエントリに限る。
返り値は { entries, warnings }。ファイルが壊れている場合 entries は空で warnings に理由が入る。`,
    parameters: castSchema(listEntriesParameters),
    execute: async (args) => {
      const parsed = listEntriesParameters.parse(args);
      const outcome = await runJournalOperation(loadEntries);
      const entries = filterByTags(outcome.entries, parsed?.tags ?? [], {
        match: parsed?.match ?? 'any',
      });

      return JSON.stringify({
        entries,
        warnings: warningsOf(
          outcome.status === 'malformed' ? outcome.error : undefined,
        ),
      });
    },
  };

  const searchEntriesTool: MCPTool = {
    name: 'searchEntries',
    description: `エントリを検索する。
mode=title（既定）はタイトルの部分一致、mode=tag はタグの完全一致（いずれも大文字小文字を区別しない）。
mode=fuzzy はタイトルのあいまい検索で、類似度 cutoff（既定 0.5）以上を最大 limit（既定 10）件、類似度順にタイトルだけ返す。`,
    parameters: castSchema(searchEntriesParameters),
    execute: async (args) => {
      const parsed = searchEntriesParameters.parse(args);
      const { entries } = await runJournalOperation(loadEntries);

      switch (parsed.mode ?? 'title') {
        case 'tag':
          return JSON.stringify(searchByTagExact(entries, parsed.query));
        case 'fuzzy':
          return JSON.stringify(
            fuzzySearchTitles(
              entries.map(({ title }) => title),
              parsed.query,
              parsed.limit ?? DEFAULT_FUZZY_MAX_RESULTS,
              parsed.cutoff ?? DEFAULT_FUZZY_CUTOFF,
            ),
          );
        case 'title':
          return JSON.stringify(searchByTitleSubstring(entries, parsed.query));
      }
    },
  };

  const getStatsTool: MCPTool = {
    name: 'getStats',
    description: `ジャーナルの統計を返す。
{ count, distinctTagCount, mostCommonTag, totalWords, avgWordsPerEntry } 形式で、エントリやタグがない場合は該当項目が null になる。`,
    execute: async () => {
      const { entries } = await runJournalOperation(loadEntries);
      return JSON.stringify(stats(entries));
    },
  };

  const deleteEntryTool: MCPTool = {
    name: 'deleteEntry',
    description: `id を指定してエントリを 1 件削除する。
存在しない id の場合は UserError を返し、ファイルは変更しない。`,
    parameters: castSchema(deleteEntryParameters),
    execute: async (args) => {
      const parsed = deleteEntryParameters.parse(args);
      await runJournalOperation(() => store.delete(parsed.id));
      return JSON.stringify({ deletedId: parsed.id });
    },
  };

  return [
    addEntryTool,
    listEntriesTool,
    searchEntriesTool,
    getStatsTool,
    deleteEntryTool,
  ];
};
