export const MAX_TITLE_LENGTH = 50;
export const MAX_CONTENT_LENGTH = 200;

export interface JournalEntry {
  readonly id: string;
  readonly title: string;
  readonly content: string;
  readonly date: string;
  readonly tags: readonly string[];
}

export type TagMatchMode = 'any' | 'all';

export interface JournalStats {
  readonly count: number;
  readonly distinctTagCount: number;
  readonly mostCommonTag: string | null;
  readonly totalWords: number;
  readonly avgWordsPerEntry: number | null;
}
