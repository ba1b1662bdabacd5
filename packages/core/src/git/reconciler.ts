/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { FileChange, NumstatTotals, StatusEntry } from './types.js';

/**
 * Joins status entries with numstat totals by path. The status listing
 * decides which records exist and in what order; numstat-only paths are
 * ignored and missing totals default to zero.
 */
export function reconcile(
  entries: readonly StatusEntry[],
  totals: NumstatTotals,
): FileChange[] {
  return entries.map((entry) => ({
    path: entry.path,
    indexStatus: entry.indexStatus,
    worktreeStatus: entry.worktreeStatus,
    added: totals.added.get(entry.path) ?? 0,
    deleted: totals.deleted.get(entry.path) ?? 0,
    binary: totals.binary.get(entry.path) ?? false,
  }));
}
