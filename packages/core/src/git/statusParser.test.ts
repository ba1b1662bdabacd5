/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { parseShortStatus } from './statusParser.js';
import { FileStatus } from './types.js';

describe('parseShortStatus', () => {
  it('parses index and worktree columns in listing order', () => {
    const entries = parseShortStatus('M  a.go\n M b.go\n?? c.txt\n');

    expect(entries).toEqual([
      {
        path: 'a.go',
        indexStatus: FileStatus.Modified,
        worktreeStatus: FileStatus.Clean,
        rawLine: 'M  a.go',
      },
      {
        path: 'b.go',
        indexStatus: FileStatus.Clean,
        worktreeStatus: FileStatus.Modified,
        rawLine: ' M b.go',
      },
      {
        path: 'c.txt',
        indexStatus: FileStatus.Untracked,
        worktreeStatus: FileStatus.Untracked,
        rawLine: '?? c.txt',
      },
    ]);
  });

  it('keys renames by their destination path', () => {
    const [entry] = parseShortStatus('R  old.go -> new.go');

    expect(entry.path).toBe('new.go');
    expect(entry.indexStatus).toBe(FileStatus.Renamed);
  });

  it('uses the text after the last arrow when a name contains one', () => {
    const [entry] = parseShortStatus('R  a -> b.txt -> c.txt');

    expect(entry.path).toBe('c.txt');
  });

  it('extracts the destination of a modified-in-index rename line', () => {
    const [entry] = parseShortStatus('M  old.go -> new.go');

    expect(entry.path).toBe('new.go');
    expect(entry.indexStatus).toBe(FileStatus.Modified);
  });

  it('drops short and blank lines without disturbing neighbours', () => {
    const entries = parseShortStatus('A  first.ts\nM\n\n   \n D last.ts');

    expect(entries.map((entry) => entry.path)).toEqual([
      'first.ts',
      'last.ts',
    ]);
  });

  it('maps characters outside the status alphabet to Unknown', () => {
    const [entry] = parseShortStatus(' T link');

    expect(entry.indexStatus).toBe(FileStatus.Clean);
    expect(entry.worktreeStatus).toBe(FileStatus.Unknown);
  });

  it('decodes quoted paths', () => {
    const entries = parseShortStatus(
      '?? "with space.txt"\nR  "a b" -> "caf\\303\\251.md"',
    );

    expect(entries.map((entry) => entry.path)).toEqual([
      'with space.txt',
      'café.md',
    ]);
  });

  it('returns nothing for an empty report', () => {
    expect(parseShortStatus('')).toEqual([]);
  });
});
