import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_LABEL: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: pc.gray('DEBUG'),
  info: pc.cyan('INFO '),
  warn: pc.yellow('WARN '),
  error: pc.red('ERROR'),
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

let threshold: LogLevel = readLevelFromEnv();

function readLevelFromEnv(): LogLevel {
  const raw = process.env['AUTOMATOR_BRIDGE_LOG_LEVEL']?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'info';
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function write(level: Exclude<LogLevel, 'silent'>, scope: string, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  console.error(`${pc.dim(`[${new Date().toISOString()}]`)} ${LEVEL_LABEL[level]} ${pc.magenta(`[${scope}]`)} ${message}`);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message) => write('debug', scope, message),
    info: (message) => write('info', scope, message),
    warn: (message) => write('warn', scope, message),
    error: (message, error) => {
      write('error', scope, error === undefined ? message : `${message}: ${errorMessage(error)}`);
      if (error instanceof Error && error.stack && threshold === 'debug') {
        console.error(pc.dim(error.stack));
      }
    },
  };
}
