export type LogLevel = 'info' | 'warn' | 'error';

export type LogEntry = {
  createdAt: string;
  level: LogLevel;
  message: string;
};

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const writers: Record<LogLevel, (line: string) => void> = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Console logger with a bracketed component prefix. Entries are also handed
 * to `onEntry` when given, so a caller can keep them for the run history.
 */
export function createLogger(scope: string, onEntry?: (entry: LogEntry) => void): Logger {
  const write = (level: LogLevel, message: string) => {
    writers[level](`[${scope}] ${message}`);
    onEntry?.({ createdAt: new Date().toISOString(), level, message });
  };
  return {
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
