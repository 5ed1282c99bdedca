import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import path from 'node:path';
import { JOURNAL_HOME_ENV } from '../../src/journal/storage/paths.js';

const importCli = async () => {
  vi.resetModules();
  return import('../../src/bin/journal.js');
};

describe('cli server command', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  afterEach(() => {
    delete process.env[JOURNAL_HOME_ENV];
    process.exitCode = undefined;
    vi.restoreAllMocks();
    vi.doUnmock('../../src/mcp/cli.js');
  });

  it('server コマンドで --home のストアを渡してサーバーを起動する', async () => {
    const startMock = vi.fn();

    vi.doMock('../../src/mcp/cli.js', () => ({
      runJournalServer: startMock,
    }));

    const { runCli } = await importCli();

    await runCli({ argv: ['--home', '/tmp/pocket-journal-home', 'server'] });

    expect(startMock).toHaveBeenCalledWith({
      store: expect.objectContaining({
        filePath: path.resolve('/tmp/pocket-journal-home', 'journal.json'),
      }),
    });
  });

  it('server コマンドに余分な引数があればエラーにする', async () => {
    const startMock = vi.fn();

    vi.doMock('../../src/mcp/cli.js', () => ({
      runJournalServer: startMock,
    }));

    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { runCli } = await importCli();

    await runCli({ argv: ['server', '--transport', 'httpStream'] });

    expect(startMock).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith(
      'server コマンドで不明なオプションです: --transport httpStream',
    );
    expect(process.exitCode).toBe(1);
  });
});
