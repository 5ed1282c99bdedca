import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type pino from 'pino';
import { z } from 'zod';
import { createJournalEntry, normalizeTags } from '../entry.js';
import {
  MalformedStoreError,
  NotFoundError,
  ValidationError,
  hasErrorCode,
} from '../errors.js';
import { mostCommonTag } from '../query/queryEngine.js';
import type { JournalEntry } from '../types.js';
import { withFileLock, type FileLockOptions } from './fileLock.js';
import { resolveCorruptBackupFile, resolveLockFile } from './paths.js';
import { logger as defaultLogger } from '../../logger.js';

const storedEntrySchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  content: z.string(),
  date: z.string(),
  tags: z.array(z.string()),
});

const storedCollectionSchema = z
  .array(storedEntrySchema)
  .superRefine((entries, context) => {
    const seen = new Set<string>();
    entries.forEach(({ id }, index) => {
      if (seen.has(id)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate id ${id}`,
          path: [index, 'id'],
        });
      }
      seen.add(id);
    });
  });

/**
 * ジャーナルファイルの読み込み結果。壊れたファイルと文字数超過を呼び出し側が区別して扱えるようにする。
 */
export type LoadOutcome =
  | { readonly status: 'ok'; readonly entries: JournalEntry[] }
  | {
      readonly status: 'malformed';
      readonly entries: [];
      readonly error: MalformedStoreError;
    }
  | {
      readonly status: 'invalid';
      readonly entries: [];
      readonly error: ValidationError;
    };

export interface EntryStoreOptions {
  readonly filePath: string;
  readonly logger?: pino.Logger;
  /** `false` で読み込み→保存の間のロックを取らない。 */
  readonly lock?: FileLockOptions | false;
  readonly clock?: () => Date;
  readonly generateId?: () => string;
}

const describeZodError = (error: z.ZodError): string => {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
};

/**
 * 単一の JSON ファイルにエントリ一覧を保存するストア。
 * どの操作も毎回ファイル全体を読み直し、メモリ上にキャッシュを持たない。
 */
export class EntryStore {
  readonly filePath: string;

  private readonly logger: pino.Logger;
  private readonly lockOptions: FileLockOptions | false;
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(options: EntryStoreOptions) {
    this.filePath = path.resolve(options.filePath);
    this.logger = (options.logger ?? defaultLogger).child({
      component: 'entry-store',
    });
    this.lockOptions = options.lock ?? {};
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async read(): Promise<LoadOutcome> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        return { status: 'ok', entries: [] };
      }
      throw error;
    }

    if (raw.trim().length === 0) {
      return { status: 'ok', entries: [] };
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error: unknown) {
      if (error instanceof SyntaxError) {
        return this.malformed(error.message, error);
      }
      throw error;
    }

    const parsed = storedCollectionSchema.safeParse(data);
    if (!parsed.success) {
      return this.malformed(describeZodError(parsed.error), parsed.error);
    }

    try {
      return { status: 'ok', entries: parsed.data.map(createJournalEntry) };
    } catch (error: unknown) {
      if (error instanceof ValidationError) {
        return { status: 'invalid', entries: [], error };
      }
      throw error;
    }
  }

  /**
   * 壊れたファイルは空として扱い警告だけ残す。文字数超過のレコードは ValidationError をそのまま投げる。
   */
  async load(): Promise<JournalEntry[]> {
    const outcome = await this.read();

    switch (outcome.status) {
      case 'ok':
        return outcome.entries;
      case 'malformed':
        this.logger.warn(
          { filePath: this.filePath, reason: outcome.error.message },
          'journal file is malformed, treating it as empty',
        );
        return [];
      case 'invalid':
        throw outcome.error;
    }
  }

  /**
   * 一時ファイルに書き出してから rename で置き換える。
   */
  async save(entries: readonly JournalEntry[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    const data = JSON.stringify(entries, null, 2);
    await fs.writeFile(tempPath, `${data}\n`, 'utf8');
    await fs.rename(tempPath, this.filePath);

    this.logger.debug(
      { filePath: this.filePath, count: entries.length },
      'journal saved',
    );
  }

  async add(
    title: string,
    content: string,
    tags: readonly string[] = [],
  ): Promise<JournalEntry> {
    return this.mutate(async (entries) => {
      const existingIds = new Set(entries.map(({ id }) => id));
      let id = this.generateId();
      while (existingIds.has(id)) {
        id = this.generateId();
      }

      const entry = createJournalEntry({
        id,
        title,
        content,
        date: this.clock().toISOString(),
        tags: normalizeTags(tags),
      });

      await this.save([...entries, entry]);
      return entry;
    });
  }

  async delete(id: string): Promise<void> {
    await this.mutate(async (entries) => {
      if (!entries.some((entry) => entry.id === id)) {
        throw new NotFoundError(id);
      }

      await this.save(entries.filter((entry) => entry.id !== id));
    });
  }

  /**
   * 前提: タグを 1 つ以上持つエントリが含まれていること。満たさない場合は NoTagsError。
   */
  mostCommonTag(entries: readonly JournalEntry[]): string {
    return mostCommonTag(entries);
  }

  private malformed(
    reason: string,
    cause: unknown,
  ): Extract<LoadOutcome, { status: 'malformed' }> {
    return {
      status: 'malformed',
      entries: [],
      error: new MalformedStoreError(this.filePath, reason, { cause }),
    };
  }

  private async mutate<T>(
    task: (entries: JournalEntry[]) => Promise<T>,
  ): Promise<T> {
    const run = async (): Promise<T> => {
      const outcome = await this.read();

      if (outcome.status === 'invalid') {
        throw outcome.error;
      }

      if (outcome.status === 'malformed') {
        const backupPath = resolveCorruptBackupFile(this.filePath);
        await fs.copyFile(this.filePath, backupPath);
        this.logger.warn(
          { filePath: this.filePath, backupPath, reason: outcome.error.message },
          'journal file is malformed, backed it up before overwriting',
        );
      }

      return task(outcome.entries);
    };

    if (this.lockOptions === false) {
      return run();
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    return withFileLock(resolveLockFile(this.filePath), run, this.lockOptions);
  }
}
