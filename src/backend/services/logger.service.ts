/**
 * Structured Logging Service
 *
 * Structured logging with levels and per-component loggers.
 *
 * Every entry is appended as a JSON line to `<baseDir>/logs/loom.log`. In development the
 * entry is also pretty-printed to stderr; in production only errors are echoed there.
 * Nothing is ever written to stdout, which carries the JSON-RPC stream in wire mode.
 */

import { createWriteStream, existsSync, mkdirSync, type WriteStream } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { type LogLevel, LoggerEnvSchema } from './env-schemas';

interface LogEntry {
  level: LogLevel;
  timestamp: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  includeTimestamp: boolean;
  serviceName: string;
  writeFile: boolean;
}

function getLogLevelPriority(level: LogLevel): number {
  const priorities: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
  };
  return priorities[level];
}

/**
 * Safely stringify an object, handling circular references.
 * Pre-processes with ancestor tracking to replace circular references,
 * invokes toJSON() on objects that define it, then uses JSON.stringify
 * on the safe result.
 */
function safeStringify(obj: unknown): string {
  try {
    const ancestors = new WeakSet<object>();

    function preprocessValue(value: unknown): unknown {
      if (typeof value !== 'object' || value === null) {
        return value;
      }

      if (ancestors.has(value)) {
        return '[Circular]';
      }

      if ('toJSON' in value && typeof value.toJSON === 'function') {
        return preprocessValue(value.toJSON());
      }

      ancestors.add(value);

      try {
        if (Array.isArray(value)) {
          return value.map((item) => preprocessValue(item));
        }

        const result: Record<string, unknown> = {};
        for (const [key, val] of Object.entries(value)) {
          result[key] = preprocessValue(val);
        }
        return result;
      } finally {
        ancestors.delete(value);
      }
    }

    return JSON.stringify(preprocessValue(obj));
  } catch {
    return String(obj);
  }
}

function getBaseDir(): string {
  return LoggerEnvSchema.parse(process.env).BASE_DIR ?? join(homedir(), '.loom');
}

let _logFileStream: WriteStream | null = null;
let _logFilePath: string | null = null;

function initLogFileStream(): WriteStream | null {
  try {
    const logsDir = join(getBaseDir(), 'logs');
    if (!existsSync(logsDir)) {
      mkdirSync(logsDir, { recursive: true });
    }
    _logFilePath = join(logsDir, 'loom.log');
    const stream = createWriteStream(_logFilePath, { flags: 'a' });
    stream.on('error', () => {
      _logFileStream = null;
    });
    return stream;
  } catch {
    return null;
  }
}

function getLogFileStream(): WriteStream | null {
  if (!_logFileStream) {
    _logFileStream = initLogFileStream();
  }
  return _logFileStream;
}

/**
 * Get the path of the log file (for display in CLI messages).
 */
export function getLogFilePath(): string {
  return _logFilePath ?? join(getBaseDir(), 'logs', 'loom.log');
}

function getDefaultConfig(): LoggerConfig {
  const env = LoggerEnvSchema.parse(process.env);
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.NODE_ENV !== 'production',
    includeTimestamp: true,
    serviceName: env.SERVICE_NAME,
    writeFile: env.NODE_ENV !== 'test',
  };
}

export class Logger {
  private config: LoggerConfig;
  private component: string;

  constructor(component: string, config?: Partial<LoggerConfig>) {
    this.component = component;
    this.config = {
      ...getDefaultConfig(),
      ...config,
    };
  }

  /**
   * Create a child logger with additional context
   */
  child(component: string): Logger {
    return new Logger(`${this.component}:${component}`, this.config);
  }

  private shouldLog(level: LogLevel): boolean {
    return getLogLevelPriority(level) <= getLogLevelPriority(this.config.level);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      timestamp: this.config.includeTimestamp ? new Date().toISOString() : '',
      message,
      context: {
        ...context,
        service: this.config.serviceName,
        component: this.component,
      },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    if (this.config.prettyPrint) {
      this.prettyOutput(entry);
    } else {
      this.jsonOutput(entry);
    }
  }

  private writeToLogFile(entry: LogEntry): void {
    if (!this.config.writeFile) {
      return;
    }
    const stream = getLogFileStream();
    if (stream) {
      stream.write(`${safeStringify(entry)}\n`);
    }
  }

  /**
   * Production output: the log file, with only errors echoed to stderr.
   */
  private jsonOutput(entry: LogEntry): void {
    this.writeToLogFile(entry);

    if (entry.level === 'error') {
      console.error(safeStringify(entry));
    }
  }

  /**
   * Development output: the log file plus a colored line on stderr.
   */
  private prettyOutput(entry: LogEntry): void {
    this.writeToLogFile(entry);

    const levelColors: Record<LogLevel, string> = {
      error: '\x1b[31m', // Red
      warn: '\x1b[33m', // Yellow
      info: '\x1b[36m', // Cyan
      debug: '\x1b[37m', // White
    };
    const reset = '\x1b[0m';
    const color = levelColors[entry.level];

    let output = `${color}[${entry.level.toUpperCase()}]${reset}`;
    if (entry.timestamp) {
      output += ` ${entry.timestamp}`;
    }
    output += ` [${this.component}] ${entry.message}`;

    if (entry.context) {
      const { service: _service, component: _component, ...rest } = entry.context;
      if (Object.keys(rest).length > 0) {
        output += ` ${safeStringify(rest)}`;
      }
    }

    console.error(output);
    if (entry.level === 'error' && entry.error?.stack) {
      console.error(entry.error.stack);
    }
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: Error, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: Error | Record<string, unknown>,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error) {
      this.log('error', message, context, errorOrContext);
    } else {
      this.log('error', message, errorOrContext);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /**
   * Log turn lifecycle events of the agent loop
   */
  turnEvent(
    event: 'started' | 'finished' | 'cancelled' | 'failed' | 'max_steps_reached',
    agentName: string,
    context?: Record<string, unknown>
  ): void {
    this.info(`Turn ${event}`, {
      event,
      agentName,
      ...context,
    });
  }

  /**
   * Log provider calls
   */
  providerCall(
    provider: string,
    model: string,
    duration: number,
    success: boolean,
    context?: Record<string, unknown>
  ): void {
    this.info(`Provider call ${success ? 'succeeded' : 'failed'}`, {
      provider,
      model,
      duration,
      success,
      ...context,
    });
  }
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}
