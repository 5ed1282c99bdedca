import { describe, expect, it } from 'vitest';
import * as journal from '../src/index.js';

describe('public exports', () => {
  it('ストアと検索関数を公開する', () => {
    expect(typeof journal.EntryStore).toBe('function');
    expect(typeof journal.filterByTags).toBe('function');
    expect(typeof journal.fuzzySearchTitles).toBe('function');
    expect(typeof journal.stats).toBe('function');
    expect(typeof journal.createLogger).toBe('function');
  });

  it('文字数の上限を公開する', () => {
    expect(journal.MAX_TITLE_LENGTH).toBe(50);
    expect(journal.MAX_CONTENT_LENGTH).toBe(200);
  });

  it('エラークラスは JournalError を継承する', () => {
    const error = new journal.NotFoundError('x');

    expect(error).toBeInstanceOf(journal.JournalError);
    expect(error.code).toBe('NOT_FOUND');
  });
});
