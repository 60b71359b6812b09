export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.dim,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
};

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export type LoggerOptions = {
  level?: LogLevel;
  color?: boolean;
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function resolveLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const raw = String(process.env.LOG_LEVEL || 'info').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function timestamp(): string {
  return new Date().toISOString().replace('T', ' ').split('.')[0];
}

function serialize(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message });
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

/**
 * Scoped console logger. Lines look like
 * `[2026-01-02 10:00:00] [WARN] [ResilientClient] message {"attempt":1}`.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[resolveLevel(options.level)];
  const color = options.color ?? Boolean(process.stdout.isTTY);

  const write = (level: LogLevel, message: string, data?: unknown) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const tag = `[${level.toUpperCase()}]`;
    const prefix = color
      ? `${COLORS.dim}[${timestamp()}]${COLORS.reset} ${LEVEL_COLORS[level]}${tag}${COLORS.reset} [${scope}]`
      : `[${timestamp()}] ${tag} [${scope}]`;
    const line = data === undefined ? `${prefix} ${message}` : `${prefix} ${message} ${serialize(data)}`;
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function maskSecret(value: string): string {
  return value.length > 12 ? `${value.slice(0, 8)}...${value.slice(-4)}` : '***';
}
