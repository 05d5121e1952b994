import fs from 'node:fs/promises';
import { logFile, logsDir } from './paths.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface FileLoggerOptions {
  /** Echo each line to stdout. Must be off while the tower owns the terminal. */
  echo?: boolean;
  minLevel?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Appends `[timestamp] [level] message` lines to `.crewmux/logs/<name>.log`.
 *
 * Calls never block and never throw: lines are queued on a single write chain,
 * and a failed append is counted in `dropped` rather than surfaced.
 */
export class FileLogger implements Logger {
  private chain: Promise<void> = Promise.resolve();
  private readonly path: string;
  private readonly dir: string;
  dropped = 0;

  constructor(
    projectRoot: string,
    name: string,
    private readonly options: FileLoggerOptions = {},
  ) {
    this.path = logFile(projectRoot, name);
    this.dir = logsDir(projectRoot);
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  /** Resolves once every queued line has been written or dropped. */
  flush(): Promise<void> {
    return this.chain;
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.options.minLevel ?? 'info']) return;

    const line = `[${new Date().toISOString()}] [${level}] ${message}\n`;
    if (this.options.echo) {
      process.stdout.write(line);
    }

    this.chain = this.chain
      .then(() => this.append(line))
      .catch(() => {
        this.dropped++;
      });
  }

  private async append(line: string): Promise<void> {
    try {
      await fs.appendFile(this.path, line, 'utf-8');
    } catch {
      // Log dir may not exist yet on first call
      await fs.mkdir(this.dir, { recursive: true });
      await fs.appendFile(this.path, line, 'utf-8');
    }
  }
}

export function createLogger(projectRoot: string, name: string, options?: FileLoggerOptions): FileLogger {
  return new FileLogger(projectRoot, name, options);
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
