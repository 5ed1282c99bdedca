import { ValidationError } from './errors.js';
import {
  MAX_CONTENT_LENGTH,
  MAX_TITLE_LENGTH,
  type JournalEntry,
} from './types.js';

// サロゲートペアを 1 文字として数える。
const characterLength = (value: string): number => [...value].length;

/**
 * 文字数制限を検証したうえでエントリを組み立てる。
 * 新規作成時とファイルからの読み込み時の両方で使う。
 */
export const createJournalEntry = (input: JournalEntry): JournalEntry => {
  if (characterLength(input.title) > MAX_TITLE_LENGTH) {
    throw new ValidationError('title', MAX_TITLE_LENGTH);
  }

  if (characterLength(input.content) > MAX_CONTENT_LENGTH) {
    throw new ValidationError('content', MAX_CONTENT_LENGTH);
  }

  return {
    id: input.id,
    title: input.title,
    content: input.content,
    date: input.date,
    tags: [...input.tags],
  };
};

/**
 * タグの前後の空白を取り除き、空になったものを捨てる。重複はそのまま残す。
 */
export const normalizeTags = (tags: readonly string[]): string[] => {
  return tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
};

/**
 * `--tags a,b` やシードファイルのカンマ区切り表記をタグ配列に展開する。
 */
export const parseTagList = (values: readonly string[] | string): string[] => {
  const list = typeof values === 'string' ? [values] : values;
  return normalizeTags(list.flatMap((value) => value.split(',')));
};
