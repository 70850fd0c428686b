import type { LogLevel } from './config.ts';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type Logger = {
  debug: (module: string, message: string) => void;
  info: (module: string, message: string) => void;
  warn: (module: string, message: string) => void;
  error: (module: string, message: string) => void;
};

/** Logger with the module column already filled in. */
export type ModuleLogger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

/** Receives formatted lines; console by default. */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

export function createLogger(level: LogLevel, sink: LogSink = consoleSink): Logger {
  const threshold = LEVELS[level] ?? LEVELS.info;
  const log = (lvl: LogLevel, module: string, message: string) => {
    if (LEVELS[lvl] < threshold) return;
    const stamp = new Date().toISOString();
    sink(lvl, `${stamp} | ${lvl} | ${module} | ${message}`);
  };
  return {
    debug: (module, message) => log('debug', module, message),
    info: (module, message) => log('info', module, message),
    warn: (module, message) => log('warn', module, message),
    error: (module, message) => log('error', module, message)
  };
}

export function forModule(logger: Logger, module: string): ModuleLogger {
  return {
    debug: (message) => logger.debug(module, message),
    info: (message) => logger.info(module, message),
    warn: (message) => logger.warn(module, message),
    error: (message) => logger.error(module, message)
  };
}
