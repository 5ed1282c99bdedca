import type { EntryStore } from '../journal/storage/entryStore.js';
import { logger } from '../logger.js';
import { createJournalServer, serverMetadata } from './server.js';

export interface RunJournalServerOptions {
  readonly store: EntryStore;
}

/**
 * stdio トランスポートで MCP サーバーを起動する。ログは stderr にだけ出す。
 */
export const runJournalServer = async (
  options: RunJournalServerOptions,
): Promise<void> => {
  const server = createJournalServer(options.store);

  logger.info(
    {
      server: serverMetadata.name,
      version: serverMetadata.version,
      filePath: options.store.filePath,
    },
    'starting MCP server on stdio',
  );

  await server.start({ transportType: 'stdio' });
};
