import chalk from 'chalk';

export type LogLevel = 'section' | 'info' | 'success' | 'warn' | 'error' | 'debug';

export interface Logger {
  section(title: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  color?: boolean;
  stream?: NodeJS.WritableStream;
}

/**
 * Human-oriented logger. Everything goes to stderr so that `--json` output on
 * stdout stays machine readable.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly stream: NodeJS.WritableStream;
  private readonly paint: chalk.Chalk;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.stream = options.stream ?? process.stderr;
    this.paint = new chalk.Instance({ level: options.color === false ? 0 : chalk.level });
  }

  section(title: string): void {
    this.write(this.paint.blue(`\n==== ${title} ====`));
  }

  info(message: string): void {
    this.write(message);
  }

  success(message: string): void {
    this.write(this.paint.green(`✓ ${message}`));
  }

  warn(message: string): void {
    this.write(this.paint.yellow(`⚠ ${message}`));
  }

  error(message: string): void {
    this.write(this.paint.red(`✗ ${message}`));
  }

  debug(message: string): void {
    if (this.verbose) {
      this.write(this.paint.gray(message));
    }
  }

  private write(line: string): void {
    this.stream.write(`${line}\n`);
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
}

// Collects entries in memory; used by tests and by `--json` runs.
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  section(title: string): void {
    this.entries.push({ level: 'section', message: title });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  success(message: string): void {
    this.entries.push({ level: 'success', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
  }
}
