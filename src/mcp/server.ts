import { FastMCP } from 'fastmcp';
import type { EntryStore } from '../journal/storage/entryStore.js';
import { buildJournalTools } from './tools.js';

const SERVER_NAME = 'pocket-journal';
const SERVER_VERSION = '0.1.0';
const SERVER_INSTRUCTIONS =
  'pocket-journal MCP server for adding, listing, searching and deleting tagged journal entries.';

/**
 * ジャーナル操作ツールを公開する FastMCP サーバーを生成する。
 */
export const createJournalServer = (store: EntryStore) => {
  const server = new FastMCP({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    instructions: SERVER_INSTRUCTIONS,
  });

  server.addTools(buildJournalTools(store));

  return server;
};

export const serverMetadata = {
  name: SERVER_NAME,
  version: SERVER_VERSION,
  instructions: SERVER_INSTRUCTIONS,
};
