/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * One column of a short-status line. `Unknown` covers any character git
 * prints outside the alphabet below (for example `T` or `!`).
 */
export enum FileStatus {
  Clean = ' ',
  Modified = 'M',
  Added = 'A',
  Deleted = 'D',
  Renamed = 'R',
  Copied = 'C',
  Unmerged = 'U',
  Untracked = '?',
  Unknown = 'unknown',
}

const STATUS_BY_CODE: ReadonlyMap<string, FileStatus> = new Map([
  [' ', FileStatus.Clean],
  ['M', FileStatus.Modified],
  ['A', FileStatus.Added],
  ['D', FileStatus.Deleted],
  ['R', FileStatus.Renamed],
  ['C', FileStatus.Copied],
  ['U', FileStatus.Unmerged],
  ['?', FileStatus.Untracked],
]);

export function parseFileStatus(code: string): FileStatus {
  return STATUS_BY_CODE.get(code) ?? FileStatus.Unknown;
}

/** A single line of `git status --porcelain`, before numstat data is joined in. */
export interface StatusEntry {
  path: string;
  indexStatus: FileStatus;
  worktreeStatus: FileStatus;
  rawLine: string;
}

export interface NumstatTotals {
  added: Map<string, number>;
  deleted: Map<string, number>;
  binary: Map<string, boolean>;
}

export interface FileChange {
  readonly path: string;
  readonly indexStatus: FileStatus;
  readonly worktreeStatus: FileStatus;
  /** Lines added across the staged and unstaged diffs. */
  readonly added: number;
  /** Lines deleted across the staged and unstaged diffs. */
  readonly deleted: number;
  readonly binary: boolean;
}

export function hasStagedChanges(change: FileChange): boolean {
  return (
    change.indexStatus !== FileStatus.Clean &&
    change.indexStatus !== FileStatus.Untracked
  );
}

export function hasWorktreeChanges(change: FileChange): boolean {
  return change.worktreeStatus !== FileStatus.Clean;
}
