const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  brightBlack: '\x1b[90m',
};

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

const levelColor: Record<LogLevel, string> = {
  error: colors.red,
  warn: colors.yellow,
  info: colors.cyan,
  debug: colors.brightBlack,
};

let currentLevel: LogLevel = parseLogLevel(process.env.CASEWORK_LOG_LEVEL) ?? 'warn';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(currentLevel);
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel) => (message: string, ...details: unknown[]) => {
    if (!enabled(level)) return;
    const color = process.stderr.isTTY ? levelColor[level] : '';
    const reset = color ? colors.reset : '';
    console.error(`${color}${level.toUpperCase()}${reset} [${scope}] ${message}`, ...details);
  };

  return {
    error: write('error'),
    warn: write('warn'),
    info: write('info'),
    debug: write('debug'),
  };
}
