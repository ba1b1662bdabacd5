/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { decodeGitPath, resolveRenameDestination } from './paths.js';
import type { NumstatTotals } from './types.js';

/** What numstat prints in place of a count for binary files. */
export const BINARY_SENTINEL = '-';

export function createNumstatTotals(): NumstatTotals {
  return {
    added: new Map(),
    deleted: new Map(),
    binary: new Map(),
  };
}

function parseCount(field: string): number | undefined {
  if (!/^\d+$/.test(field)) {
    return undefined;
  }
  return parseInt(field, 10);
}

function addTo(map: Map<string, number>, path: string, count: number): void {
  map.set(path, (map.get(path) ?? 0) + count);
}

/**
 * Folds one `git diff --numstat` report into `totals`.
 *
 * Each line is `ADDED\tDELETED\tPATH`. Renames either append the
 * destination as an extra field or encode it inside the path field; both
 * are keyed by the destination. A `-` count marks the path binary and adds
 * nothing for that column.
 */
export function accumulateNumstat(
  totals: NumstatTotals,
  report: string,
): void {
  if (report.trim() === '') {
    return;
  }
  for (const line of report.replace(/\n+$/, '').split('\n')) {
    const fields = line.split('\t');
    if (fields.length < 3) {
      continue;
    }
    const [addedField, deletedField] = fields;
    const path = decodeGitPath(
      resolveRenameDestination(fields[fields.length - 1]),
    );

    if (addedField === BINARY_SENTINEL || deletedField === BINARY_SENTINEL) {
      totals.binary.set(path, true);
    }

    const added = parseCount(addedField);
    if (added !== undefined) {
      addTo(totals.added, path, added);
    }
    const deleted = parseCount(deletedField);
    if (deleted !== undefined) {
      addTo(totals.deleted, path, deleted);
    }
  }
}

/**
 * Sums the committed→staged and staged→worktree reports into one set of
 * per-path totals.
 */
export function aggregateNumstat(
  stagedReport: string,
  unstagedReport: string,
): NumstatTotals {
  const totals = createNumstatTotals();
  accumulateNumstat(totals, stagedReport);
  accumulateNumstat(totals, unstagedReport);
  return totals;
}
