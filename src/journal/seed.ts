import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { parseTagList } from './entry.js';

export const DEFAULT_SEED_FILE = fileURLToPath(
  new URL('../../data/seed-entries.json', import.meta.url),
);

const seedEntrySchema = z.object({
  title: z.string(),
  content: z.string(),
  tags: z.union([z.array(z.string()), z.string()]).optional(),
});

const seedFileSchema = z.array(seedEntrySchema);

export interface SeedEntry {
  readonly title: string;
  readonly content: string;
  readonly tags: string[];
}

/**
 * シード用 JSON を読み込む。tags は配列でもカンマ区切り文字列でもよい。
 * 文字数の検証は追加時にストア側で行う。
 */
export const loadSeedEntries = async (
  filePath: string = DEFAULT_SEED_FILE,
): Promise<SeedEntry[]> => {
  const raw = await fs.readFile(path.resolve(filePath), 'utf8');
  const data = seedFileSchema.parse(JSON.parse(raw));

  return data.map(({ title, content, tags }) => ({
    title,
    content,
    tags: tags === undefined ? [] : parseTagList(tags),
  }));
};
