import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const paint: Record<Exclude<LogLevel, 'silent'>, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function createLogger(level: LogLevel = 'info', scope = 'agent'): Logger {
  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>) => {
    if (RANK[at] < RANK[level]) return;
    const line = `${chalk.dim(new Date().toISOString())} ${paint[at](at.toUpperCase().padEnd(5))} ${chalk.bold(`[${scope}]`)} ${message}`;
    const extra = data && Object.keys(data).length > 0 ? ' ' + chalk.gray(JSON.stringify(data)) : '';
    // diagnostics go to stderr so CLI output on stdout stays clean
    console.error(line + extra);
  };
  return {
    debug: (m, d) => emit('debug', m, d),
    info: (m, d) => emit('info', m, d),
    warn: (m, d) => emit('warn', m, d),
    error: (m, d) => emit('error', m, d),
    child: (child: string) => createLogger(level, `${scope}:${child}`),
  };
}

export const silentLogger: Logger = createLogger('silent');
