import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { UserError } from 'fastmcp';
import type { Context } from 'fastmcp';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { EntryStore } from '../../src/journal/storage/entryStore.js';
import {
  addEntryParameters,
  buildJournalTools,
  searchEntriesParameters,
} from '../../src/mcp/tools.js';

type MCPAuth = Record<string, unknown> | undefined;

const createContextStub = (): Context<MCPAuth> => {
  return {
    client: {
      version: {
        name: 'test-client',
        version: '1.0.0',
      },
    },
    log: {
      debug: () => {},
      error: () => {},
      info: () => {},
      warn: () => {},
    },
    reportProgress: async () => {},
    streamContent: async () => {},
    session: undefined,
  } as unknown as Context<MCPAuth>;
};

describe('buildJournalTools', () => {
  let tempDir: string;
  let filePath: string;
  let store: EntryStore;

  const findTool = (name: string) => {
    const tool = buildJournalTools(store).find((candidate) => candidate.name === name);
    if (!tool) {
      throw new Error(`tool not registered: ${name}`);
    }
    return tool;
  };

  const callTool = async (name: string, args: unknown): Promise<unknown> => {
    const result = await findTool(name).execute(args, createContextStub());
    if (typeof result !== 'string') {
      throw new Error(`unexpected result from ${name}`);
    }
    return JSON.parse(result) as unknown;
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'journal-tools-'));
    filePath = path.join(tempDir, 'journal.json');
    store = new EntryStore({ filePath, logger: pino({ level: 'silent' }) });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('ジャーナル操作ツールが定義されている', () => {
    const toolNames = buildJournalTools(store).map(({ name }) => name);

    expect(toolNames).toEqual([
      'addEntry',
      'listEntries',
      'searchEntries',
      'getStats',
      'deleteEntry',
    ]);
  });

  it('引数スキーマが tags の省略を許容し、不正な mode を拒否する', () => {
    expect(addEntryParameters.safeParse({ title: 't', content: 'c' }).success).toBe(
      true,
    );
    expect(addEntryParameters.safeParse({ title: 't' }).success).toBe(false);
    expect(
      searchEntriesParameters.safeParse({ query: 'q', mode: 'regex' }).success,
    ).toBe(false);
  });

  it('addEntry がエントリを保存して返す', async () => {
    const created = (await callTool('addEntry', {
      title: 'Setup Env',
      content: 'Installed tools',
      tags: [' setup ', 'tools'],
    })) as { id: string; tags: string[] };

    expect(created.tags).toEqual(['setup', 'tools']);
    await expect(store.load()).resolves.toEqual([created]);
  });

  it('addEntry は文字数超過時に UserError を返す', async () => {
    await expect(
      findTool('addEntry').execute(
        { title: 'a'.repeat(51), content: 'c' },
        createContextStub(),
      ),
    ).rejects.toBeInstanceOf(UserError);

    await expect(store.load()).resolves.toEqual([]);
  });

  it('listEntries が登録順に返し、タグで絞り込める', async () => {
    const first = await store.add('Setup Env', 'Installed tools', ['setup', 'tools']);
    const second = await store.add('Wrote Tests', 'Covered edge cases', ['testing']);

    await expect(callTool('listEntries', {})).resolves.toEqual({
      entries: [first, second],
      warnings: [],
    });
    await expect(callTool('listEntries', undefined)).resolves.toEqual({
      entries: [first, second],
      warnings: [],
    });
    await expect(
      callTool('listEntries', { tags: ['TESTING', 'setup'] }),
    ).resolves.toEqual({ entries: [first, second], warnings: [] });
    await expect(
      callTool('listEntries', { tags: ['setup', 'testing'], match: 'all' }),
    ).resolves.toEqual({ entries: [], warnings: [] });
  });

  it('listEntries は壊れたファイルを空として扱い warnings に理由を返す', async () => {
    await fs.writeFile(filePath, 'not json', 'utf8');

    const result = (await callTool('listEntries', {})) as {
      entries: unknown[];
      warnings: string[];
    };

    expect(result.entries).toEqual([]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toContain(filePath);
  });

  it('searchEntries がタイトル・タグ・あいまい検索を切り替える', async () => {
    const first = await store.add('Setup Env', 'Installed tools', ['setup']);
    await store.add('Setup Environment', 'Again', ['tools']);
    const third = await store.add('Wrote Tests', 'Covered edge cases', ['testing']);

    await expect(callTool('searchEntries', { query: 'tests' })).resolves.toEqual([
      third,
    ]);
    await expect(
      callTool('searchEntries', { query: 'SETUP', mode: 'tag' }),
    ).resolves.toEqual([first]);
    await expect(
      callTool('searchEntries', { query: 'setup env', mode: 'fuzzy' }),
    ).resolves.toEqual(['Setup Env', 'Setup Environment']);
    await expect(
      callTool('searchEntries', {
        query: 'setup env',
        mode: 'fuzzy',
        limit: 1,
      }),
    ).resolves.toEqual(['Setup Env']);
  });

  it('getStats が統計を返す', async () => {
    await store.add('one', 'a b c', ['x']);
    await store.add('two', 'd e', ['y', 'x']);

    await expect(callTool('getStats', {})).resolves.toEqual({
      count: 2,
      distinctTagCount: 2,
      mostCommonTag: 'x',
      totalWords: 5,
      avgWordsPerEntry: 2.5,
    });
  });

  it('deleteEntry が指定エントリを削除する', async () => {
    const first = await store.add('削除対象', '本文');
    const second = await store.add('残すエントリ', '本文');

    await expect(callTool('deleteEntry', { id: first.id })).resolves.toEqual({
      deletedId: first.id,
    });
    await expect(store.load()).resolves.toEqual([second]);
  });

  it('deleteEntry は存在しない id で UserError を返す', async () => {
    await expect(
      findTool('deleteEntry').execute({ id: 'missing' }, createContextStub()),
    ).rejects.toBeInstanceOf(UserError);
  });
});
