import type { LogContext, Logger } from '../../src/shared/logging/logger';

export type LogEntry = {
  level: 'spam' | 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: LogContext;
};

export function createRecordingLogger(): { log: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogEntry['level']) => (message: string, context?: LogContext) => {
    entries.push({ level, message, context });
  };
  return {
    log: {
      spam: record('spam'),
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error'),
    },
    entries,
  };
}
