export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const isLogLevel = (value: string): value is LogLevel => value in LOG_LEVELS;

const envLevel = process.env.LOG_LEVEL ?? '';
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export const setLogLevel = (level: LogLevel) => {
  minLevel = level;
};

export type Logger = {
  debug: (msg: string, data?: Record<string, unknown>) => void;
  info: (msg: string, data?: Record<string, unknown>) => void;
  warn: (msg: string, data?: Record<string, unknown>) => void;
  error: (msg: string, data?: Record<string, unknown>) => void;
};

const format = (scope: string, level: LogLevel, msg: string, data?: Record<string, unknown>) => {
  const prefix = `[${level.toUpperCase()}] [${scope}] ${msg}`;
  return data ? `${prefix} ${JSON.stringify(data)}` : prefix;
};

export const createLogger = (scope: string): Logger => {
  const emit = (level: LogLevel, msg: string, data?: Record<string, unknown>) => {
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return;
    const line = format(scope, level, msg, data);
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    debug: (msg, data) => emit('debug', msg, data),
    info: (msg, data) => emit('info', msg, data),
    warn: (msg, data) => emit('warn', msg, data),
    error: (msg, data) => emit('error', msg, data)
  };
};
