import fs from 'fs';
import path from 'path';

// LOG_DIR が指定されたときだけファイルにも追記する（テストでは未指定）
const logsDir = process.env.LOG_DIR ? path.resolve(process.env.LOG_DIR) : null;

if (logsDir && !fs.existsSync(logsDir)) {
  fs.mkdirSync(logsDir, { recursive: true });
}

const logFile = logsDir
  ? path.join(logsDir, `server-${new Date().toISOString().split('T')[0]}.log`)
  : null;

const debugEnabled = () => process.env.LOG_LEVEL === 'debug';

function formatLogMessage(
  level: string,
  message: string,
  ...args: unknown[]
): string {
  const timestamp = new Date().toISOString();
  const formattedArgs = args
    .map((arg) => {
      if (arg instanceof Error) {
        return arg.stack ?? arg.message;
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
  if (!logFile) return;
  fs.appendFileSync(logFile, message, 'utf8');
}

export const logger = {
  log: (message: string, ...args: unknown[]) => {
    const formatted = formatLogMessage('INFO', message, ...args);
    console.log(message, ...args);
    writeToFile(formatted);
  },

  info: (message: string, ...args: unknown[]) => {
    const formatted = formatLogMessage('INFO', message, ...args);
    console.info(message, ...args);
    writeToFile(formatted);
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
    if (!debugEnabled()) return;
    const formatted = formatLogMessage('DEBUG', message, ...args);
    console.log(message, ...args);
    writeToFile(formatted);
  },

  getLogFilePath: () => logFile,
};
