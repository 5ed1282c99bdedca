import pino from 'pino';
import { z } from 'zod';

export const LOG_LEVEL_ENV = 'POCKET_JOURNAL_LOG_LEVEL';

const DEFAULT_LOG_LEVEL = 'warn';

const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);

export type LogLevel = z.infer<typeof logLevelSchema>;

export const resolveLogLevel = (): LogLevel => {
  const parsed = logLevelSchema.safeParse(process.env[LOG_LEVEL_ENV]?.trim());
  return parsed.success ? parsed.data : DEFAULT_LOG_LEVEL;
};

/**
 * stderr に JSON 行を出力するロガーを生成する。
 * stdout はコマンド出力と MCP の stdio 通信で使うため書き込まない。
 */
export const createLogger = (
  bindings: Record<string, unknown> = {},
): pino.Logger => {
  const baseLogger = pino(
    {
      name: 'pocket-journal',
      level: resolveLogLevel(),
    },
    pino.destination(2),
  );

  return baseLogger.child(bindings);
};

export const logger = createLogger();
