/**
 * Console-based logging utility with environment-aware formatting.
 * - Development (NODE_ENV !== 'production'): Pretty, colored output
 * - Production: JSON structured output
 */

// ANSI color codes for terminal output
const colors = {
  dim: '\u001B[2m',
  gray: '\u001B[90m',
  cyan: '\u001B[36m',
  red: '\u001B[31m',
  reset: '\u001B[0m',
  yellow: '\u001B[33m',
} as const;

export type LogContext = Record<string, unknown>;

export type LogLevel = 'debug' | 'error' | 'info' | 'warn';

type Threshold = LogLevel | 'silent';

export interface TimerResult {
  end: (level: LogLevel, message: string, context?: LogContext) => void;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  component?: string;
  context?: LogContext;
  correlationId?: string;
  durationMs?: number;
  error?: {
    message: string;
    name: string;
    stack?: string;
  };
}

// Log level priority for filtering
const LOG_LEVELS: Record<Threshold, number> = {
  debug: 0,
  error: 3,
  info: 1,
  silent: 4,
  warn: 2,
};

function parseThreshold(value: string | undefined): Threshold {
  switch (value) {
    case 'debug':
    case 'error':
    case 'info':
    case 'silent':
    case 'warn': {
      return value;
    }
    default: {
      return 'debug';
    }
  }
}

export interface LoggerOptions {
  component?: string;
  correlationId?: string;
}

export class Logger {
  private component?: string;
  private correlationId?: string;
  private isProduction: boolean;
  private minLevel: Threshold;

  constructor(options: LoggerOptions = {}) {
    this.component = options.component;
    this.correlationId = options.correlationId;
    this.isProduction = process.env.NODE_ENV === 'production';
    this.minLevel = parseThreshold(process.env.LOG_LEVEL);
  }

  /**
   * Create a child logger with a bound correlation ID.
   */
  child(correlationId: string): Logger {
    return new Logger({ component: this.component, correlationId });
  }

  /**
   * Create a logger tagged with the subsystem that writes through it.
   */
  forComponent(component: string): Logger {
    return new Logger({ component, correlationId: this.correlationId });
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log('error', message, context, error);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  /**
   * Start a timer for measuring operation duration.
   * Returns an object with an `end` method to log the completion.
   */
  startTimer(operation: string): TimerResult {
    const startTime = Date.now();
    this.debug(`Starting: ${operation}`);

    return {
      end: (level: LogLevel, message: string, context?: LogContext) => {
        const durationMs = Date.now() - startTime;
        this.log(level, message, context, undefined, durationMs);
      },
    };
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  private formatError(error: unknown): LogEntry['error'] | undefined {
    if (!error) return undefined;
    if (error instanceof Error) {
      return {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }
    const message =
      typeof error === 'object' && 'message' in error
        ? String(error.message)
        : JSON.stringify(error);
    return {
      message,
      name: 'UnknownError',
    };
  }

  private formatPretty(entry: LogEntry): string {
    const levelColors: Record<LogLevel, string> = {
      debug: colors.gray,
      error: colors.red,
      info: colors.cyan,
      warn: colors.yellow,
    };

    const color = levelColors[entry.level];
    const timestamp = `${colors.dim}${entry.timestamp}${colors.reset}`;
    const level = `${color}${entry.level.toUpperCase().padEnd(5)}${colors.reset}`;
    const component = entry.component ? `${colors.dim}${entry.component}:${colors.reset} ` : '';
    const correlationId = entry.correlationId
      ? `${colors.dim}[${entry.correlationId}]${colors.reset} `
      : '';
    const duration =
      entry.durationMs === undefined
        ? ''
        : ` ${colors.dim}(${String(entry.durationMs)}ms)${colors.reset}`;

    let output = `${timestamp} ${level} ${correlationId}${component}${entry.message}${duration}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  ${colors.dim}${JSON.stringify(entry.context)}${colors.reset}`;
    }

    if (entry.error) {
      output += `\n  ${colors.red}${entry.error.name}: ${entry.error.message}${colors.reset}`;
      if (entry.error.stack) {
        output += `\n${colors.dim}${entry.error.stack}${colors.reset}`;
      }
    }

    return output;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: unknown,
    durationMs?: number,
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.minLevel]) return;

    const entry: LogEntry = {
      component: this.component,
      context,
      correlationId: this.correlationId,
      durationMs,
      error: this.formatError(error),
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    const output = this.isProduction ? JSON.stringify(entry) : this.formatPretty(entry);

    switch (level) {
      case 'error': {
        console.error(output);
        break;
      }
      case 'warn': {
        console.warn(output);
        break;
      }
      default: {
        console.log(output);
      }
    }
  }
}

// Export singleton instance for general use (non-request contexts)
export const logger = new Logger();
