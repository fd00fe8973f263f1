import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';

interface CallerInfo {
  file?: string;
  line?: number;
  function?: string;
}

const isCallSiteArray = (value: unknown): value is NodeJS.CallSite[] =>
  Array.isArray(value) &&
  value.every((frame) => typeof frame === 'object' && frame !== null && 'getFileName' in frame);

/**
 * Logging settings, built by `loadConfig` from LOG_* variables.
 */
export interface LogSettings {
  level: string;
  dir: string;
  rotation: string;
  retention: string;
  compress: boolean;
  // Test run: không ghi file, không in ra console
  silent: boolean;
}

// Trước khi loadConfig chạy: chỉ console
const BOOTSTRAP_SETTINGS: LogSettings = {
  level: 'info',
  dir: './logs',
  rotation: '10MB',
  retention: '30d',
  compress: true,
  silent: false,
};

class LoggingConfig {
  private readonly logLevel: string;
  private readonly rotation: string;
  private readonly retention: string;
  private readonly compression: boolean;
  private readonly logDir: string;
  private readonly silent: boolean;

  constructor(settings: LogSettings) {
    this.logLevel = settings.level.toLowerCase();
    this.rotation = settings.rotation;
    this.retention = settings.retention;
    this.compression = settings.compress;
    this.silent = settings.silent;
    this.logDir = path.resolve(settings.dir);
  }

  get level(): string {
    return this.logLevel;
  }

  private getCallerInfo(): CallerInfo {
    const originalFunc = Error.prepareStackTrace;
    let caller: CallerInfo = {};

    try {
      Error.prepareStackTrace = (_err, stack) => stack;
      const stack: unknown = new Error().stack;
      Error.prepareStackTrace = originalFunc;

      if (!isCallSiteArray(stack)) {
        return caller;
      }

      // Bỏ qua 2 frame đầu (getCallerInfo và winston format function)
      for (let i = 2; i < stack.length; i++) {
        const frame = stack[i];
        const file = frame.getFileName();

        // Bỏ qua các file node_modules và winston internal
        if (file && !file.includes('node_modules') && !file.includes('winston') && !file.endsWith('logging.ts')) {
          caller = {
            file,
            line: frame.getLineNumber() ?? undefined,
            function: frame.getFunctionName() || 'anonymous',
          };
          break;
        }
      }
    } finally {
      Error.prepareStackTrace = originalFunc;
    }

    return caller;
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackLabel: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const callerInfo = this.getCallerInfo();
    const location = callerInfo.file && callerInfo.line
      ? ` | ${callerInfo.file}:${callerInfo.line}${callerInfo.function ? ` (${callerInfo.function})` : ''}`
      : '';

    const stackStr = typeof stack === 'string' ? `\n${stackLabel}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${location}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf((info) => this.formatLine(info, '')),
    );
  }

  createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf((info) => this.formatLine(info, 'Stack: ')),
    );
  }

  private parseRotation(rotation: string): { maxSize?: string; datePattern?: string } {
    if (rotation.includes('MB') || rotation.includes('KB') || rotation.includes('GB')) {
      return { maxSize: rotation };
    } else if (rotation.includes('day') || rotation.includes('hour')) {
      return { datePattern: 'YYYY-MM-DD' };
    }
    return { maxSize: '10MB' };
  }

  private parseRetention(retention: string): string {
    // Convert retention format (e.g., "30 days" -> "30d")
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const num = match[1];
      const unit = match[2].toLowerCase();
      if (unit.startsWith('d')) return `${num}d`;
      if (unit.startsWith('h')) return `${num}h`;
    }
    return '30d';
  }

  private createFileTransport(baseName: string, level?: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.rotation);
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${baseName}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: this.parseRetention(this.retention),
      zippedArchive: this.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  createTransports(withFiles = true) {
    const consoleTransport = new winston.transports.Console({
      level: this.logLevel,
      format: this.createConsoleFormat(),
      silent: this.silent,
    });

    if (this.silent || !withFiles) {
      return [consoleTransport];
    }

    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
    return [
      consoleTransport,
      // System log (tất cả các level từ logLevel trở lên)
      this.createFileTransport('sys'),
      // Error log
      this.createFileTransport('error', 'error'),
    ];
  }

  setupLogging(withFiles = true): winston.Logger {
    return winston.createLogger({
      level: this.logLevel,
      format: this.createFileFormat(),
      transports: this.createTransports(withFiles),
      exitOnError: false,
    });
  }
}

// Setup logging when module is imported (console only until configureLogging)
export const logger = new LoggingConfig(BOOTSTRAP_SETTINGS).setupLogging(false);

/**
 * Apply the loaded settings to the shared logger; child loggers follow it.
 */
export const configureLogging = (settings: LogSettings): winston.Logger => {
  const loggingConfig = new LoggingConfig(settings);
  logger.configure({
    level: loggingConfig.level,
    format: loggingConfig.createFileFormat(),
    transports: loggingConfig.createTransports(),
    exitOnError: false,
  });
  return logger;
};

export { LoggingConfig };

export const getLogger = (name: string): winston.Logger => logger.child({ name });

export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}
