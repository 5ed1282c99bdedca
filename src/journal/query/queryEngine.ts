import { NoTagsError } from '../errors.js';
import type { JournalEntry, JournalStats, TagMatchMode } from '../types.js';

export { fuzzySearchTitles, similarityRatio } from './similarity.js';

export interface FilterByTagsOptions {
  /** `any`: いずれかのタグが一致すれば採用（既定）。`all`: 指定タグをすべて持つものだけ採用。 */
  readonly match?: TagMatchMode;
}

const normalizeQueryTag = (tag: string): string => tag.trim().toLowerCase();

const lowerCaseTags = (entry: JournalEntry): Set<string> => {
  return new Set(entry.tags.map((tag) => tag.toLowerCase()));
};

/**
 * 指定タグでエントリを絞り込む。比較は大文字小文字を区別しない。
 * 空白だけのタグは無視し、指定が 1 つもなければ入力をそのまま返す。
 */
export const filterByTags = (
  entries: readonly JournalEntry[],
  tags: readonly string[],
  options: FilterByTagsOptions = {},
): JournalEntry[] => {
  const requested = tags
    .map(normalizeQueryTag)
    .filter((tag) => tag.length > 0);

  if (requested.length === 0) {
    return [...entries];
  }

  const match = options.match ?? 'any';

  return entries.filter((entry) => {
    const entryTags = lowerCaseTags(entry);
    return match === 'all'
      ? requested.every((tag) => entryTags.has(tag))
      : requested.some((tag) => entryTags.has(tag));
  });
};

export const searchByTitleSubstring = (
  entries: readonly JournalEntry[],
  query: string,
): JournalEntry[] => {
  const needle = query.toLowerCase();
  return entries.filter((entry) => entry.title.toLowerCase().includes(needle));
};

export const searchByTagExact = (
  entries: readonly JournalEntry[],
  query: string,
): JournalEntry[] => {
  const needle = normalizeQueryTag(query);
  return entries.filter((entry) => lowerCaseTags(entry).has(needle));
};

/**
 * 空白区切りのトークン数を数える。
 */
export const countWords = (text: string): number => {
  return text.split(/\s+/u).filter((token) => token.length > 0).length;
};

const countTags = (entries: readonly JournalEntry[]): Map<string, number> => {
  const counts = new Map<string, number>();
  for (const entry of entries) {
    for (const tag of entry.tags) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }
  return counts;
};

const pickMostCommon = (counts: Map<string, number>): string | null => {
  let best: string | null = null;
  let bestCount = 0;

  // 同数の場合は先に出現したタグを残す。
  for (const [tag, count] of counts) {
    if (count > bestCount) {
      best = tag;
      bestCount = count;
    }
  }

  return best;
};

/**
 * 最も多く使われているタグを返す。タグ付きのエントリが 1 件もなければ NoTagsError。
 */
export const mostCommonTag = (entries: readonly JournalEntry[]): string => {
  const tag = pickMostCommon(countTags(entries));
  if (tag === null) {
    throw new NoTagsError();
  }
  return tag;
};

export const stats = (entries: readonly JournalEntry[]): JournalStats => {
  const counts = countTags(entries);
  const totalWords = entries.reduce(
    (sum, entry) => sum + countWords(entry.content),
    0,
  );

  return {
    count: entries.length,
    distinctTagCount: counts.size,
    mostCommonTag: pickMostCommon(counts),
    totalWords,
    avgWordsPerEntry: entries.length > 0 ? totalWords / entries.length : null,
  };
};
