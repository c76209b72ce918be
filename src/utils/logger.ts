/**
 * Log level
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
}

/**
 * Destination for formatted log lines
 */
export type LogOutput = {
  log(line: string): void;
  error(line: string): void;
};

/**
 * Logger configuration
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
  output: LogOutput;
};

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
};

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.SUCCESS, LogLevel.WARNING, LogLevel.ERROR];

export const consoleOutput: LogOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

/**
 * Logger class with colored output and a switchable destination
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? true,
      output: config.output ?? consoleOutput,
    };
  }

  /**
   * Get emoji for log level
   */
  private getEmoji(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '🔍';
      case LogLevel.INFO:
        return 'ℹ️';
      case LogLevel.SUCCESS:
        return '✅';
      case LogLevel.WARNING:
        return '⚠️';
      case LogLevel.ERROR:
        return '❌';
      default:
        return '•';
    }
  }

  /**
   * Format date to human readable string (MM-DD HH:mm:ss)
   */
  private formatDate(date: Date): string {
    const month = (date.getMonth() + 1).toString().padStart(2, '0');
    const day = date.getDate().toString().padStart(2, '0');
    const hour = date.getHours().toString().padStart(2, '0');
    const min = date.getMinutes().toString().padStart(2, '0');
    const sec = date.getSeconds().toString().padStart(2, '0');
    return `${month}-${day} ${hour}:${min}:${sec}`;
  }

  private format(level: LogLevel, message: string): string {
    return `${this.formatDate(new Date())} ${this.getEmoji(level)} ${message}`;
  }

  private colorize(text: string, color: string): string {
    if (!this.config.useColors) return text;
    return `${color}${text}${colors.reset}`;
  }

  debug(message: string): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.config.output.log(this.format(LogLevel.DEBUG, this.colorize(message, colors.dim)));
    }
  }

  info(message: string): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.config.output.log(this.format(LogLevel.INFO, this.colorize(message, colors.blue)));
    }
  }

  success(message: string): void {
    if (this.shouldLog(LogLevel.SUCCESS)) {
      this.config.output.log(this.format(LogLevel.SUCCESS, this.colorize(message, colors.green)));
    }
  }

  warning(message: string): void {
    if (this.shouldLog(LogLevel.WARNING)) {
      this.config.output.log(this.format(LogLevel.WARNING, this.colorize(message, colors.yellow)));
    }
  }

  error(message: string): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.config.output.error(this.format(LogLevel.ERROR, this.colorize(message, colors.red)));
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  /**
   * Redirect output (e.g. to a file while the alternate screen is active)
   *
   * @returns The previous output, so callers can restore it
   */
  setOutput(output: LogOutput, useColors = this.config.useColors): LogOutput {
    const previous = this.config.output;
    this.config.output = output;
    this.config.useColors = useColors;
    return previous;
  }
}

// Default logger instance
export const logger: Logger = new Logger();
