/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { decodeGitPath } from './paths.js';
import { parseFileStatus, type StatusEntry } from './types.js';

const RENAME_SEPARATOR = ' -> ';

/**
 * Parses `git status --porcelain` output:
 *
 *   XY PATH
 *   XY ORIG_PATH -> PATH
 *
 * X is the index column, Y the worktree column. Renames are keyed by their
 * destination. Lines too short to carry a path are dropped. Output follows
 * the order git printed.
 */
export function parseShortStatus(text: string): StatusEntry[] {
  const entries: StatusEntry[] = [];
  for (const line of text.split('\n')) {
    if (line.trim() === '' || line.length < 3) {
      continue;
    }
    let path = line.slice(3).trim();
    const separator = path.lastIndexOf(RENAME_SEPARATOR);
    if (separator >= 0) {
      path = path.slice(separator + RENAME_SEPARATOR.length).trim();
    }
    if (path === '') {
      continue;
    }
    entries.push({
      path: decodeGitPath(path),
      indexStatus: parseFileStatus(line[0]),
      worktreeStatus: parseFileStatus(line[1]),
      rawLine: line,
    });
  }
  return entries;
}
