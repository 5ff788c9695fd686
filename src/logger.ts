export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = process.env.DEBUG ? 'debug' : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

// stdout carries results (and the MCP transport), so every level goes to stderr.
function write(level: LogLevel, msg: string, meta?: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[threshold]) return;
  const line = `[${level.toUpperCase()}] ${msg}`;
  if (meta) {
    console.error(line, JSON.stringify(meta));
  } else {
    console.error(line);
  }
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => write('debug', msg, meta),
  info: (msg: string, meta?: Record<string, unknown>) => write('info', msg, meta),
  warn: (msg: string, meta?: Record<string, unknown>) => write('warn', msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => write('error', msg, meta),
};
