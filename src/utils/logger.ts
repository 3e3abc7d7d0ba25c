/**
 * Logger for the track rebuilder
 *
 * Level-filtered terminal logging with optional timestamps, plus helpers
 * for timing pipeline stages and recording file writes.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface LoggerOptions {
  level?: LogLevel;
  /**
   * Print the wall-clock time (HH:MM:SS.mmm) after the prefix
   */
  timestamp?: boolean;
  /**
   * Attach the elapsed milliseconds to timed operations
   */
  duration?: boolean;
  prefix?: string;
  /**
   * Receives every formatted line. Defaults to console.log.
   */
  sink?: LogSink;
}

export type LogSink = (line: string, context?: LoggerContext) => void;

/**
 * Structured fields attached to a log line
 */
export interface LoggerContext {
  operation?: string | undefined;
  stage?: string | undefined;
  sourceTrack?: string | undefined;
  script?: string | undefined;
  filePath?: string | undefined;
  fileSize?: number | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

interface LevelStyle {
  rank: number;
  label: string;
  color: string;
}

const LEVEL_STYLES: Record<LogLevel, LevelStyle> = {
  [LogLevel.DEBUG]: { rank: 0, label: 'DEBUG', color: '\x1b[90m' },
  [LogLevel.INFO]: { rank: 1, label: 'INFO', color: '\x1b[36m' },
  [LogLevel.WARN]: { rank: 2, label: 'WARN', color: '\x1b[33m' },
  [LogLevel.ERROR]: { rank: 3, label: 'ERROR', color: '\x1b[31m' }
};

const RESET = '\x1b[0m';

const consoleSink: LogSink = (line, context) => {
  if (context) {
    console.log(line, context);
  } else {
    console.log(line);
  }
};

export class Logger {
  private readonly level: LogLevel;
  private readonly timestamp: boolean;
  private readonly duration: boolean;
  private readonly prefix: string;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.timestamp = options.timestamp ?? true;
    this.duration = options.duration ?? true;
    this.prefix = options.prefix ?? 'AnimRebuild';
    this.sink = options.sink ?? consoleSink;
  }

  shouldLog(level: LogLevel): boolean {
    return LEVEL_STYLES[level].rank >= LEVEL_STYLES[this.level].rank;
  }

  private write(level: LogLevel, message: string, context?: LoggerContext): void {
    if (!this.shouldLog(level)) return;

    const { label, color } = LEVEL_STYLES[level];
    const time = this.timestamp ? ` @ ${new Date().toISOString().slice(11, 23)}` : '';
    this.sink(`${color}${this.prefix} [${label}]${time} ${message}${RESET}`, context);
  }

  debug(message: string, context?: LoggerContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.write(LogLevel.ERROR, message, context);
  }

  /**
   * Run an async operation, logging its start at debug level and its outcome
   * at info level. Errors are logged and rethrown.
   */
  async withTiming<T>(operation: string, fn: () => Promise<T>, context?: LoggerContext): Promise<T> {
    const startedAt = Date.now();
    const elapsed = (): LoggerContext => (this.duration ? { duration: Date.now() - startedAt } : {});

    this.debug(`Starting operation: ${operation}`, { operation, ...context });
    try {
      const result = await fn();
      this.info(`Completed operation: ${operation}`, { operation, ...elapsed(), ...context, success: true });
      return result;
    } catch (error) {
      this.info(`Completed operation: ${operation}`, {
        operation,
        ...elapsed(),
        ...context,
        success: false,
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }

  logFileOperation(operation: string, filePath: string, fileSize?: number, context?: LoggerContext): void {
    this.info(`File operation: ${operation}`, { operation, filePath, fileSize, ...context });
  }

  logStage(stage: string, context?: LoggerContext): void {
    this.info(`Stage: ${stage}`, { stage, ...context });
  }

  logConfig(config: Record<string, unknown>): void {
    this.debug('Configuration loaded', { config });
  }

  logError(error: Error, context?: LoggerContext): void {
    this.error(`Error occurred: ${error.message}`, { error: error.message, stack: error.stack, ...context });
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Loggers for the parts of a run
 */
export const LoggerFactory = {
  forPipeline(debug: boolean = false): Logger {
    return createLogger({
      level: debug ? LogLevel.DEBUG : LogLevel.INFO,
      prefix: 'AnimRebuild-Pipeline'
    });
  },

  /**
   * Selection reports go to their own channel without timestamps
   */
  forSelection(debug: boolean = false): Logger {
    return createLogger({
      level: debug ? LogLevel.DEBUG : LogLevel.INFO,
      timestamp: false,
      duration: false,
      prefix: 'AnimRebuild-Select'
    });
  },

  forFileOperations(debug: boolean = false): Logger {
    return createLogger({
      level: debug ? LogLevel.DEBUG : LogLevel.INFO,
      duration: false,
      prefix: 'AnimRebuild-File'
    });
  }
};
