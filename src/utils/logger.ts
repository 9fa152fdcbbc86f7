export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  isEnabled(level: LogLevel): boolean {
    return levelRank[level] >= levelRank[this.opts.level ?? 'info'];
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();

    if (this.opts.json) {
      process.stderr.write(`${JSON.stringify({ timestamp, level, message, data })}\n`);
      return;
    }

    const line = data === undefined ? `${timestamp} ${level} ${message}` : `${timestamp} ${level} ${message} ${safeJson(data)}`;
    process.stderr.write(`${line}\n`);
  }
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}

let _logger: Logger | null = null;

/**
 * Process-wide diagnostic logger. Debug output only shows with `--verbose`;
 * `--quiet` switches to JSON lines so it can sit next to the quiet renderer's events.
 */
export function getLogger(): Logger {
  if (!_logger) {
    _logger = new Logger({
      level: process.env.SEEDLING_VERBOSE === '1' ? 'debug' : 'warn',
      json: process.env.SEEDLING_QUIET === '1'
    });
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}
