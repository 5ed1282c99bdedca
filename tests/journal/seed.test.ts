import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ZodError } from 'zod';
import { DEFAULT_SEED_FILE, loadSeedEntries } from '../../src/journal/seed.js';

describe('loadSeedEntries', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'seed-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('配列とカンマ区切りの両方の tags 表記を受け付ける', async () => {
    const filePath = path.join(tempDir, 'seed.json');
    await fs.writeFile(
      filePath,
      JSON.stringify([
        { title: 'A', content: 'a', tags: 'setup, tools' },
        { title: 'B', content: 'b', tags: [' git ', ''] },
        { title: 'C', content: 'c' },
      ]),
      'utf8',
    );

    await expect(loadSeedEntries(filePath)).resolves.toEqual([
      { title: 'A', content: 'a', tags: ['setup', 'tools'] },
      { title: 'B', content: 'b', tags: ['git'] },
      { title: 'C', content: 'c', tags: [] },
    ]);
  });

  it('構造が合わないファイルは ZodError になる', async () => {
    const filePath = path.join(tempDir, 'seed.json');
    await fs.writeFile(filePath, JSON.stringify([{ title: 'no content' }]), 'utf8');

    await expect(loadSeedEntries(filePath)).rejects.toBeInstanceOf(ZodError);
  });

  it('同梱のシードファイルを読み込める', async () => {
    expect(path.basename(DEFAULT_SEED_FILE)).toBe('seed-entries.json');

    const seeds = await loadSeedEntries();

    expect(seeds).toHaveLength(5);
    expect(seeds[0]).toEqual({
      title: 'Configured the editor',
      content: 'Turned on format-on-save and picked a calmer color theme.',
      tags: ['setup', 'tools'],
    });
  });
});
