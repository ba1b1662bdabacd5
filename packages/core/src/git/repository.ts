/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { ExternalToolError } from '../utils/errors.js';
import { debugLogger } from '../utils/debugLogger.js';

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

/**
 * Everything gitstage needs from a repository. Queries return the raw text
 * git printed; mutations resolve once git exits successfully.
 */
export interface RepositoryProvider {
  /** Short-status report (`git status --porcelain`). */
  status(): Promise<string>;
  /** Line counts from the last commit to the index. */
  stagedNumstat(): Promise<string>;
  /** Line counts from the index to the working tree. */
  unstagedNumstat(): Promise<string>;
  add(paths: readonly string[]): Promise<void>;
  reset(paths: readonly string[]): Promise<void>;
  restore(paths: readonly string[]): Promise<void>;
  clean(paths: readonly string[]): Promise<void>;
}

export interface GitCliRepositoryOptions {
  cwd: string;
  /** Git executable; defaults to `git` on the PATH. */
  gitPath?: string;
}

/**
 * RepositoryProvider backed by the git command line. Commands run without
 * a shell, so paths are passed through verbatim.
 */
export class GitCliRepository implements RepositoryProvider {
  readonly cwd: string;
  readonly gitPath: string;

  constructor({ cwd, gitPath = 'git' }: GitCliRepositoryOptions) {
    this.cwd = cwd;
    this.gitPath = gitPath;
  }

  status(): Promise<string> {
    return this.run(['status', '--porcelain']);
  }

  stagedNumstat(): Promise<string> {
    return this.run(['diff', '--cached', '--numstat']);
  }

  unstagedNumstat(): Promise<string> {
    return this.run(['diff', '--numstat']);
  }

  async add(paths: readonly string[]): Promise<void> {
    await this.run(['add', '--', ...paths]);
  }

  async reset(paths: readonly string[]): Promise<void> {
    await this.run(['reset', '-q', '--', ...paths]);
  }

  async restore(paths: readonly string[]): Promise<void> {
    await this.run(['restore', '--', ...paths]);
  }

  async clean(paths: readonly string[]): Promise<void> {
    await this.run(['clean', '-f', '--', ...paths]);
  }

  private async run(args: string[]): Promise<string> {
    debugLogger.debug(`[git] ${this.gitPath} ${args.join(' ')}`, {
      cwd: this.cwd,
    });
    try {
      const { stdout } = await execFileAsync(this.gitPath, args, {
        cwd: this.cwd,
        // Don't wait on the index lock for read-only queries, and keep
        // git's output untranslated.
        env: { ...process.env, GIT_OPTIONAL_LOCKS: '0', LC_ALL: 'C' },
        maxBuffer: MAX_OUTPUT_BYTES,
      });
      return stdout;
    } catch (error) {
      throw ExternalToolError.fromExecError(this.gitPath, args, error);
    }
  }
}
