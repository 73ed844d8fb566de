/**
 * Debug logger for the gcpkit CLI
 * Writes every gcloud invocation and error to .gcpkit/debug.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';

const GCPKIT_DIR = '.gcpkit';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB
const LOG_PATH_ENV = 'GCPKIT_DEBUG_LOG';

let logFilePath: string | null = null;
let sessionStarted = false;
let writeDisabled = false;

/**
 * Get the debug log file path
 */
export function getLogPath(): string {
  if (!logFilePath) {
    const override = process.env[LOG_PATH_ENV];
    if (override) {
      logFilePath = override;
      return logFilePath;
    }

    // Try local .gcpkit first, fall back to home directory
    const localDir = path.join(process.cwd(), GCPKIT_DIR);
    const homeDir = path.join(homedir(), GCPKIT_DIR);

    if (fs.existsSync(localDir)) {
      logFilePath = path.join(localDir, DEBUG_LOG_FILE);
    } else {
      if (!fs.existsSync(homeDir)) {
        fs.mkdirSync(homeDir, { recursive: true });
      }
      logFilePath = path.join(homeDir, DEBUG_LOG_FILE);
    }
  }
  return logFilePath;
}

function rotateIfLarge(logPath: string): void {
  if (!fs.existsSync(logPath)) return;

  const stats = fs.statSync(logPath);
  if (stats.size <= MAX_LOG_SIZE) return;

  const backupPath = logPath + '.old';
  if (fs.existsSync(backupPath)) {
    fs.unlinkSync(backupPath);
  }
  fs.renameSync(logPath, backupPath);
}

/**
 * Append to the log; the first failure turns file logging off for the session
 */
function append(text: string): void {
  if (writeDisabled) return;

  try {
    fs.appendFileSync(getLogPath(), text);
  } catch (error) {
    writeDisabled = true;
    process.emitWarning(`gcpkit debug log disabled: ${String(error)}`);
  }
}

/**
 * Initialize logging session with separator
 */
function initSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  try {
    rotateIfLarge(getLogPath());
  } catch (error) {
    process.emitWarning(`gcpkit debug log rotation failed: ${String(error)}`);
  }

  const timestamp = new Date().toISOString();
  const separator = '='.repeat(80);
  append(`\n${separator}\n[${timestamp}] gcpkit session started (${process.argv.slice(2).join(' ')})\n${separator}\n`);
}

/**
 * Format a log entry
 */
export function formatEntry(level: string, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  let entry = `[${timestamp}] [${level}] ${message}`;

  if (data !== undefined) {
    if (data instanceof Error) {
      entry += `\n  Error: ${data.message}`;
      if (data.stack) {
        entry += `\n  Stack: ${data.stack}`;
      }
    } else if (typeof data === 'object') {
      entry += `\n  Data: ${safeStringify(data).split('\n').join('\n  ')}`;
    } else {
      entry += `\n  Data: ${String(data)}`;
    }
  }

  return entry + '\n';
}

function safeStringify(data: object | null): string {
  try {
    return JSON.stringify(data, null, 2);
  } catch {
    return '[Could not serialize]';
  }
}

function writeLog(level: string, message: string, data?: unknown): void {
  initSession();
  append(formatEntry(level, message, data));
}

export function logInfo(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

export function logError(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

/**
 * Log command execution
 */
export function logCommand(command: string, args?: Record<string, unknown>): void {
  writeLog('CMD', `Executing: ${command}`, args);
}

/**
 * Log how a command ended
 */
export function logExit(command: string, exitCode: number): void {
  writeLog('CMD', `Exited with ${exitCode}: ${command}`);
}

/**
 * Log command output (stdout/stderr)
 */
export function logOutput(type: 'stdout' | 'stderr', output: string): void {
  if (output.trim()) {
    writeLog(type.toUpperCase(), output.trim());
  }
}

/**
 * Log a full error with context for debugging
 */
export function logFullError(
  context: string,
  error: unknown,
  additionalData?: Record<string, unknown>
): void {
  const errorData: Record<string, unknown> = {
    context,
    ...additionalData,
  };

  if (error instanceof Error) {
    errorData.errorMessage = error.message;
    errorData.errorStack = error.stack;
    errorData.errorName = error.name;
  } else {
    errorData.rawError = String(error);
  }

  writeLog('ERROR', `Error in ${context}`, errorData);
}
