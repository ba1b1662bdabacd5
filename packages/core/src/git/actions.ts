/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { debugLogger } from '../utils/debugLogger.js';
import type { RepositoryProvider } from './repository.js';
import { FileStatus, hasWorktreeChanges, type FileChange } from './types.js';

/**
 * Staging operations. None of them touch the displayed list; callers are
 * expected to run a fresh load cycle once the returned promise settles.
 */
export class GitActions {
  constructor(private readonly repository: RepositoryProvider) {}

  async stage(paths: readonly string[]): Promise<void> {
    if (paths.length === 0) {
      return;
    }
    debugLogger.debug('[actions] stage', paths);
    await this.repository.add(paths);
  }

  async unstage(paths: readonly string[]): Promise<void> {
    if (paths.length === 0) {
      return;
    }
    debugLogger.debug('[actions] unstage', paths);
    await this.repository.reset(paths);
  }

  /**
   * Throws away working tree changes. Untracked files are deleted; tracked
   * files are restored from the index. Changes without a dirty worktree
   * column are skipped.
   */
  async discard(changes: readonly FileChange[]): Promise<void> {
    const untracked: string[] = [];
    const tracked: string[] = [];
    for (const change of changes) {
      if (!hasWorktreeChanges(change)) {
        continue;
      }
      if (change.worktreeStatus === FileStatus.Untracked) {
        untracked.push(change.path);
      } else {
        tracked.push(change.path);
      }
    }
    if (untracked.length > 0) {
      debugLogger.debug('[actions] clean', untracked);
      await this.repository.clean(untracked);
    }
    if (tracked.length > 0) {
      debugLogger.debug('[actions] restore', tracked);
      await this.repository.restore(tracked);
    }
  }
}
