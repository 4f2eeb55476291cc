/**
 * Structured stderr logging.
 * stdout carries answers (CLI) and the MCP stdio protocol, so every log line goes to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => console.error(line);

export function createLogger(
  scope: string,
  options: { debug?: boolean; sink?: LogSink } = {}
): Logger {
  const debugEnabled = options.debug ?? false;
  const sink = options.sink ?? stderrSink;

  const write = (level: LogLevel, message: string, fields?: LogFields) => {
    if (level === 'debug' && !debugEnabled) {
      return;
    }
    sink(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        scope,
        message,
        ...fields,
      })
    );
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (childScope) => createLogger(`${scope}:${childScope}`, options),
  };
}

/**
 * Logger that drops everything, for tests and embedders
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
