import { promises as fs } from 'node:fs';
import { setTimeout as delay } from 'node:timers/promises';
import { StoreLockedError, hasErrorCode } from '../errors.js';

export interface FileLockOptions {
  readonly retries?: number;
  readonly retryDelayMs?: number;
  readonly staleMs?: number;
}

const DEFAULT_RETRIES = 40;
const DEFAULT_RETRY_DELAY_MS = 50;
const DEFAULT_STALE_MS = 10_000;

const isStale = async (lockPath: string, staleMs: number): Promise<boolean> => {
  try {
    const stats = await fs.stat(lockPath);
    return Date.now() - stats.mtimeMs > staleMs;
  } catch (error: unknown) {
    // 確認までの間に解放された。
    if (hasErrorCode(error, 'ENOENT')) {
      return true;
    }

    throw error;
  }
};

const acquireLock = async (
  lockPath: string,
  options: Required<FileLockOptions>,
): Promise<void> => {
  for (let attempt = 0; ; attempt += 1) {
    try {
      const handle = await fs.open(lockPath, 'wx');
      try {
        await handle.writeFile(`${process.pid}\n`, 'utf8');
      } finally {
        await handle.close();
      }
      return;
    } catch (error: unknown) {
      if (!hasErrorCode(error, 'EEXIST')) {
        throw error;
      }
    }

    if (await isStale(lockPath, options.staleMs)) {
      await fs.rm(lockPath, { force: true });
      continue;
    }

    if (attempt >= options.retries) {
      throw new StoreLockedError(lockPath);
    }

    await delay(options.retryDelayMs);
  }
};

/**
 * ロックファイルを排他的に作成してから `task` を実行し、終了後に必ず解放する。
 * 同じジャーナルファイルに対する読み込み→変更→保存が別プロセスと交錯しないようにする。
 */
export const withFileLock = async <T>(
  lockPath: string,
  task: () => Promise<T>,
  options: FileLockOptions = {},
): Promise<T> => {
  await acquireLock(lockPath, {
    retries: options.retries ?? DEFAULT_RETRIES,
    retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
    staleMs: options.staleMs ?? DEFAULT_STALE_MS,
  });

  try {
    return await task();
  } finally {
    await fs.rm(lockPath, { force: true });
  }
};
