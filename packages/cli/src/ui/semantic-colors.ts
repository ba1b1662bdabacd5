/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const theme = {
  text: {
    secondary: 'gray',
  },
  status: {
    // Staged changes and insertions.
    staged: '#22c55e',
    // Worktree changes and deletions.
    worktree: '#ef4444',
    error: '#ff5555',
    warning: '#eab308',
  },
} as const;
