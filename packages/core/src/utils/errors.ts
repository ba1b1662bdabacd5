/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}

/**
 * An error that ends the program. The entry point prints its message and
 * exits with `exitCode`.
 */
export class FatalError extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FatalConfigError extends FatalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 52, options);
  }
}

/**
 * The status query failed, usually because the working directory is not
 * inside a repository. Fatal at startup; shown as an overlay on refresh.
 */
export class RepositoryUnavailableError extends FatalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 1, options);
  }
}

/**
 * A git invocation exited non-zero (or could not be started at all).
 */
export class ExternalToolError extends Error {
  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly exitCode: number | null,
    readonly stderr: string,
    reason: string,
  ) {
    const trimmed = stderr.trim();
    super(
      `${command} ${args.join(' ')}: ${reason}` +
        (trimmed ? `\n${trimmed}` : ''),
    );
    this.name = 'ExternalToolError';
  }

  /**
   * Builds an ExternalToolError from whatever `execFile` rejected with.
   */
  static fromExecError(
    command: string,
    args: readonly string[],
    error: unknown,
  ): ExternalToolError {
    let exitCode: number | null = null;
    let stderr = '';
    if (typeof error === 'object' && error !== null) {
      if ('code' in error && typeof error.code === 'number') {
        exitCode = error.code;
      }
      if ('stderr' in error) {
        if (typeof error.stderr === 'string') {
          stderr = error.stderr;
        } else if (Buffer.isBuffer(error.stderr)) {
          stderr = error.stderr.toString('utf8');
        }
      }
    }
    const reason =
      exitCode !== null ? `exit status ${exitCode}` : getErrorMessage(error);
    return new ExternalToolError(command, args, exitCode, stderr, reason);
  }
}
