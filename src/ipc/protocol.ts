/**
 * Logging and progress output
 *
 * Log lines go to stderr and to a log file under the app home.
 * Progress events are JSON lines on a separate writable (stdout by default),
 * read by GUI front ends when the CLI runs with --json:
 * {
 *   type: 'progress',
 *   taskId: string,
 *   title: string,
 *   action: 'started' | 'progress' | 'complete' | 'error',
 *   ...details
 * }
 */

import * as fs from 'fs';
import * as path from 'path';
import { Writable } from 'stream';
import { getDefaultLogPath } from '../config/paths';

export type ProgressAction = 'started' | 'progress' | 'complete' | 'error';

export interface ProgressDetails {
  status: 'scanning' | 'processing' | 'writing' | 'complete' | 'error' | 'retrying';
  statusMessage?: string;
  progress?: number;
  currentStep?: number;
  totalSteps?: number;
  details?: Record<string, unknown>;
  error?: string;
}

/**
 * Output stream for progress events, null when progress output is disabled
 */
let outputStream: Writable | null = null;

/**
 * Send progress events as JSON lines to `stream`, or disable them with null
 */
export function setTransport(stream: Writable | null): void {
  outputStream = stream;
}

/**
 * Send a progress event. A no-op until a transport is set.
 */
export function sendProgress(
  taskId: string,
  title: string,
  action: ProgressAction,
  details: ProgressDetails
): void {
  if (!outputStream) return;

  const message = {
    type: 'progress',
    taskId,
    title,
    action,
    ...details,
  };

  outputStream.write(`${JSON.stringify(message)}\n`);
}

/**
 * Wait until the last progress event has been handed to the transport
 */
export function flushProgress(): Promise<void> {
  const stream = outputStream;
  return new Promise((resolve) => {
    if (!stream) {
      resolve();
      return;
    }
    stream.write('', () => resolve());
  });
}

// Log file path, undefined until first use so ASSET_TL_HOME can be set late
let logFile: string | null | undefined;
let logDirReady = false;

/**
 * Redirect the log file, or disable the file sink with null
 */
export function setLogFile(filePath: string | null): void {
  logFile = filePath;
  logDirReady = false;
}

function resolveLogFile(): string | null {
  if (logFile === undefined) {
    logFile = getDefaultLogPath();
  }
  if (logFile && !logDirReady) {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
    logDirReady = true;
  }
  return logFile;
}

/**
 * Log to both stderr and file
 */
export function log(message: string, ...args: unknown[]): void {
  const timestamp = new Date().toISOString();
  const formattedMessage = `[${timestamp}] [asset-tl] ${message}`;
  const fullMessage = args.length > 0
    ? `${formattedMessage} ${args.map(a => JSON.stringify(a)).join(' ')}`
    : formattedMessage;

  console.error(fullMessage);

  try {
    const file = resolveLogFile();
    if (file) {
      fs.appendFileSync(file, fullMessage + '\n', 'utf-8');
    }
  } catch (error) {
    // Don't fail if we can't write to log file
    console.error('[asset-tl] Failed to write to log file:', error);
  }
}
