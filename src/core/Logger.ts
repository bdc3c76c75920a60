import winston from 'winston';
import path from 'path';
import fs from 'fs';

// File output is opt-in for a library
const LOG_FOLDER = process.env.LOG_FOLDER;

// Sensitive data patterns to filter
const SENSITIVE_PATTERNS = [
  /apikey[=:]\s*["']?[\w-]+["']?/gi,
  /token[=:]\s*["']?[\w-]+["']?/gi,
  /password[=:]\s*["']?[^"'\s&]+["']?/gi,
  /secret[=:]\s*["']?[\w-]+["']?/gi,
];

/**
 * Mask credential-like values, such as those found in query strings of logged URLs
 */
export function redactSensitive(message: string): string {
  let filtered = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    filtered = filtered.replace(pattern, (match) => {
      const [key] = match.split(/[=:]/);
      return `${key}=***REDACTED***`;
    });
  }
  return filtered;
}

const filterSensitiveData = winston.format((info) => {
  if (typeof info.message === 'string') {
    info.message = redactSensitive(info.message);
  }
  return info;
});

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.printf(({ timestamp, level, message, module }) => {
    const modulePrefix = module ? `[${module}]` : '';
    return `${timestamp} ${level} ${modulePrefix} ${message}`;
  })
);

// Custom format for file output
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.json()
);

function createFileTransports(folder: string) {
  if (!fs.existsSync(folder)) {
    fs.mkdirSync(folder, { recursive: true });
  }

  return [
    new winston.transports.File({
      filename: path.join(folder, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(folder, 'combined.log'),
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
  ];
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
    }),
    ...(LOG_FOLDER ? createFileTransports(LOG_FOLDER) : []),
  ],
});

// Create a child logger with module context
export function createLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}

export default logger;
