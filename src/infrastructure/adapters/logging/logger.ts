// Shared logging utilities
// All modules should import from this file instead of defining their own

import * as fs from 'fs';

let logFileStream: fs.WriteStream | null = null;

/**
 * Mirror every log line to an append-only file in addition to stdout/stderr.
 * Passing undefined detaches the current file.
 */
export function configureLogFile(filePath?: string): void {
  if (logFileStream) {
    logFileStream.end();
    logFileStream = null;
  }
  if (filePath) {
    logFileStream = fs.createWriteStream(filePath, { flags: 'a' });
    logFileStream.on('error', (error) => {
      process.stderr.write(`[${new Date().toISOString()}] [ERROR] [Logger] Log file unavailable: ${error.message}\n`);
      logFileStream = null;
    });
  }
}

export function closeLogFile(): Promise<void> {
  const stream = logFileStream;
  logFileStream = null;
  if (!stream) {
    return Promise.resolve();
  }
  return new Promise(resolve => stream.end(() => resolve()));
}

// Force stdout flush for non-TTY environments (systemd, cron)
function flushStdout(): void {
  if (typeof process !== 'undefined' && process.stdout && process.stdout.isTTY === false) {
    process.stdout.write('', () => {});
  }
}

function mirror(line: string): void {
  logFileStream?.write(line + '\n');
}

function writeLine(line: string): void {
  mirror(line);
  if (typeof process !== 'undefined' && process.stdout) {
    process.stdout.write(line + '\n', () => {
      flushStdout();
    });
  } else {
    console.log(line);
  }
}

function writeErrorLine(line: string): void {
  mirror(line);
  if (typeof process !== 'undefined' && process.stderr) {
    process.stderr.write(line + '\n', () => {
      flushStdout();
    });
  } else {
    console.error(line);
  }
}

export function log(module: string, message: string, ...args: unknown[]): void {
  const timestamp = new Date().toISOString();
  const argsStr = args.length > 0 ? ' ' + JSON.stringify(args) : '';
  writeLine(`[${timestamp}] [INFO] [${module}] ${message}${argsStr}`);
}

export function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  const timestamp = new Date().toISOString();
  const dataStr = data ? ` | Data: ${JSON.stringify(data)}` : '';
  writeLine(`[${timestamp}] [VERBOSE] [${component}] ${message}${dataStr}`);
}

export function logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
  const timestamp = new Date().toISOString();
  const metadataStr = metadata ? ` | Metadata: ${JSON.stringify(metadata)}` : '';
  writeLine(`[${timestamp}] [PERFORMANCE] ${operation} took ${duration}ms${metadataStr}`);
}

export function logWarning(module: string, message: string, data?: Record<string, unknown>): void {
  const timestamp = new Date().toISOString();
  const dataStr = data ? ` | Data: ${JSON.stringify(data)}` : '';
  writeErrorLine(`[${timestamp}] [WARN] [${module}] ${message}${dataStr}`);
}

export function logError(module: string, message: string, error?: unknown): void {
  const timestamp = new Date().toISOString();
  const errorStr = error instanceof Error ? ` | Error: ${error.message}` : error ? ` | Error: ${JSON.stringify(error)}` : '';
  writeErrorLine(`[${timestamp}] [ERROR] [${module}] ${message}${errorStr}`);
}
