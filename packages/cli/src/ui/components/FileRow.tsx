/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { Box, Text } from 'ink';
import {
  hasStagedChanges,
  hasWorktreeChanges,
  type FileChange,
} from '@gitstage/core';
import { theme } from '../semantic-colors.js';

export const STAGED_ICON = ' -›';
export const WORKTREE_ICON = '‹- ';

interface FileRowProps {
  file: FileChange;
  isFocused: boolean;
  showCounts: boolean;
}

function DiffCounts({ file }: { file: FileChange }): React.JSX.Element | null {
  if (file.binary) {
    return <Text color={theme.text.secondary}>{' (bin)'}</Text>;
  }
  if (file.added === 0 && file.deleted === 0) {
    return null;
  }
  return (
    <>
      {file.added > 0 && (
        <Text color={theme.status.staged}>{` +${file.added}`}</Text>
      )}
      {file.deleted > 0 && (
        <Text color={theme.status.worktree}>{` -${file.deleted}`}</Text>
      )}
    </>
  );
}

export function FileRow({
  file,
  isFocused,
  showCounts,
}: FileRowProps): React.JSX.Element {
  const icons: string[] = [];
  if (hasStagedChanges(file)) {
    icons.push(STAGED_ICON);
  }
  const dirty = hasWorktreeChanges(file);
  if (dirty) {
    icons.push(WORKTREE_ICON);
  }
  const label =
    icons.length > 0 ? `${icons.join(' ')} ${file.path}` : file.path;

  return (
    <Box>
      <Text>{isFocused ? '   *' : '    '}</Text>
      <Text
        color={dirty ? theme.status.worktree : theme.status.staged}
        bold={isFocused}
      >
        {label}
      </Text>
      {showCounts && <DiffCounts file={file} />}
    </Box>
  );
}
