import fs from 'fs';
import path from 'path';

const logsDir = process.env.LOG_DIR
  ? path.resolve(process.env.LOG_DIR)
  : path.join(__dirname, '..', 'logs');

const fileOutputEnabled = (() => {
  const flag = process.env.LOG_TO_FILE;
  if (flag !== undefined) return flag !== 'false';
  return process.env.NODE_ENV !== 'test';
})();

const logFile = path.join(
  logsDir,
  `server-${new Date().toISOString().split('T')[0]}.log`
);

let logsDirReady = false;

function formatLogMessage(
  level: string,
  message: string,
  ...args: unknown[]
): string {
  const timestamp = new Date().toISOString();
  const formattedArgs = args
    .map((arg) => {
      if (arg instanceof Error) {
        return arg.stack ?? `${arg.name}: ${arg.message}`;
      }
      if (typeof arg === 'object') {
        return JSON.stringify(arg, null, 2);
      }
      return String(arg);
    })
    .join(' ');

  return `[${timestamp}] [${level}] ${message} ${formattedArgs}\n`;
}

function writeToFile(message: string) {
  if (!fileOutputEnabled) return;
  // Create logs directory on first write
  if (!logsDirReady) {
    fs.mkdirSync(logsDir, { recursive: true });
    logsDirReady = true;
  }
  fs.appendFileSync(logFile, message, 'utf8');
}

export interface Logger {
  log(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export const logger: Logger & { getLogFilePath: () => string | null } = {
  log: (message: string, ...args: unknown[]) => {
    const formatted = formatLogMessage('INFO', message, ...args);
    console.log(message, ...args);
    writeToFile(formatted);
  },

  info: (message: string, ...args: unknown[]) => {
    logger.log(message, ...args);
  },

  error: (message: string, ...args: unknown[]) => {
    const formatted = formatLogMessage('ERROR', message, ...args);
    console.error(message, ...args);
    writeToFile(formatted);
  },

  warn: (message: string, ...args: unknown[]) => {
    const formatted = formatLogMessage('WARN', message, ...args);
    console.warn(message, ...args);
    writeToFile(formatted);
  },

  debug: (message: string, ...args: unknown[]) => {
    const formatted = formatLogMessage('DEBUG', message, ...args);
    console.log(message, ...args);
    writeToFile(formatted);
  },

  getLogFilePath: () => (fileOutputEnabled ? logFile : null),
};

/** Logger that drops everything; handy for tests and one-shot scripts. */
export const silentLogger: Logger = {
  log: () => undefined,
  info: () => undefined,
  error: () => undefined,
  warn: () => undefined,
  debug: () => undefined,
};
