import os from 'node:os';
import path from 'node:path';

export const JOURNAL_HOME_ENV = 'POCKET_JOURNAL_HOME';

const DEFAULT_HOME_DIR = '.pocket-journal';
const JOURNAL_FILE_NAME = 'journal.json';

/**
 * ジャーナルデータを保存するルートディレクトリを解決する。
 * `POCKET_JOURNAL_HOME` が設定されていればそれを優先する。
 */
export const resolveBaseDir = (): string => {
  const override = process.env[JOURNAL_HOME_ENV];
  if (override && override.trim().length > 0) {
    return path.resolve(override);
  }

  return path.join(os.homedir(), DEFAULT_HOME_DIR);
};

/**
 * エントリ一覧を保持する JSON ファイルのパスを解決する。
 */
export const resolveJournalFile = (): string => {
  return path.join(resolveBaseDir(), JOURNAL_FILE_NAME);
};

export const resolveLockFile = (journalFile: string): string => {
  return `${journalFile}.lock`;
};

export const resolveCorruptBackupFile = (journalFile: string): string => {
  return `${journalFile}.corrupt`;
};
