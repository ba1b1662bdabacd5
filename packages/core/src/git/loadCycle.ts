/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { debugLogger } from '../utils/debugLogger.js';
import {
  getErrorMessage,
  RepositoryUnavailableError,
} from '../utils/errors.js';
import { aggregateNumstat } from './numstat.js';
import { reconcile } from './reconciler.js';
import type { RepositoryProvider } from './repository.js';
import { parseShortStatus } from './statusParser.js';
import { FileStatus, type FileChange } from './types.js';

/**
 * Rebuilds the complete list of file changes from the repository: status
 * first, then both numstat reports, joined by path. Any failure aborts the
 * whole cycle; nothing partial is returned.
 */
export async function loadFileChanges(
  repository: RepositoryProvider,
): Promise<FileChange[]> {
  let statusReport: string;
  try {
    statusReport = await repository.status();
  } catch (error) {
    throw new RepositoryUnavailableError(
      `not a git repository or git error: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }
  const entries = parseShortStatus(statusReport);
  for (const entry of entries) {
    if (
      entry.indexStatus === FileStatus.Unknown ||
      entry.worktreeStatus === FileStatus.Unknown
    ) {
      debugLogger.debug('[load] unrecognised status code', {
        line: entry.rawLine,
      });
    }
  }

  const stagedReport = await repository.stagedNumstat();
  const unstagedReport = await repository.unstagedNumstat();
  const files = reconcile(
    entries,
    aggregateNumstat(stagedReport, unstagedReport),
  );

  debugLogger.debug('[load] reconciled file changes', {
    count: files.length,
  });
  return files;
}
