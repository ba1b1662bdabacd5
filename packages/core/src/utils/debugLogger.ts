/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as util from 'node:util';

type LogLevel = 'LOG' | 'WARN' | 'ERROR' | 'DEBUG';

/**
 * Thin wrapper around the console. When `GITSTAGE_DEBUG_LOG_FILE` is set,
 * every entry is also appended to that file. `debug` entries only go to the
 * file so they never end up inside the rendered terminal frame.
 */
export class DebugLogger {
  private logStream: fs.WriteStream | undefined;

  constructor(
    logFile: string | undefined = process.env['GITSTAGE_DEBUG_LOG_FILE'],
  ) {
    if (logFile) {
      this.logStream = fs.createWriteStream(logFile, { flags: 'a' });
      this.logStream.on('error', (error) => {
        console.error('Error writing to debug log stream:', error);
        this.logStream = undefined;
      });
    }
  }

  private writeToFile(level: LogLevel, args: unknown[]): void {
    if (!this.logStream) {
      return;
    }
    const message = util.format(...args);
    const timestamp = new Date().toISOString();
    this.logStream.write(`[${timestamp}] [${level}] ${message}\n`);
  }

  log(...args: unknown[]): void {
    this.writeToFile('LOG', args);
    console.log(...args);
  }

  warn(...args: unknown[]): void {
    this.writeToFile('WARN', args);
    console.warn(...args);
  }

  error(...args: unknown[]): void {
    this.writeToFile('ERROR', args);
    console.error(...args);
  }

  debug(...args: unknown[]): void {
    this.writeToFile('DEBUG', args);
  }
}

export const debugLogger = new DebugLogger();
