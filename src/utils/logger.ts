import winston from 'winston';

export interface LoggerOptions {
  /** Component tag printed on every line, e.g. `crawler` or `profiles`. */
  name: string;
  level?: string;
  logFile?: string;
}

const MAX_LOG_FILE_BYTES = 10 * 1024 * 1024;
const MAX_LOG_FILES = 5;

// Crawlers, filters and analyzers are built per request; their loggers and the file transport are
// shared process-wide so a log file is opened once and rotation tracks a single size.
const loggers = new Map<string, winston.Logger>();
const fileTransports = new Map<string, winston.transports.FileTransportInstance>();

function fileTransport(filename: string, level: string): winston.transports.FileTransportInstance {
  let transport = fileTransports.get(filename);
  if (!transport) {
    transport = new winston.transports.File({
      filename,
      level,
      maxsize: MAX_LOG_FILE_BYTES,
      maxFiles: MAX_LOG_FILES,
    });
    fileTransports.set(filename, transport);
  }
  return transport;
}

function lineFormat(component: string): winston.Logform.Format {
  return winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level.toUpperCase()} [${component}] ${String(message)}${metaStr}`;
  });
}

export function createLogger(options: LoggerOptions): winston.Logger {
  const level = options.level ?? process.env['LOG_LEVEL'] ?? 'info';
  const logFile = options.logFile ?? process.env['LOG_FILE'] ?? '';
  const key = `${options.name}|${level}|${logFile}`;

  const cached = loggers.get(key);
  if (cached) return cached;

  const transports: winston.transport[] = [new winston.transports.Console()];
  if (logFile) transports.push(fileTransport(logFile, level));

  const logger = winston.createLogger({
    level,
    format: winston.format.combine(winston.format.timestamp(), lineFormat(options.name)),
    transports,
  });
  loggers.set(key, logger);
  return logger;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
