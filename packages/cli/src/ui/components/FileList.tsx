/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { Box, Text } from 'ink';
import type { FileChange } from '@gitstage/core';
import { FileRow } from './FileRow.js';
import { theme } from '../semantic-colors.js';

interface FileListProps {
  files: readonly FileChange[];
  cursor: number;
  height: number;
  showCounts: boolean;
  emptyMessage: string;
}

/**
 * Returns the slice of rows to draw so that the cursor stays roughly in the
 * middle of a list taller than `height`.
 */
export function computeWindow(
  total: number,
  cursor: number,
  height: number,
): { start: number; end: number } {
  if (total <= height) {
    return { start: 0, end: total };
  }
  const start = Math.min(
    Math.max(cursor - Math.floor(height / 2), 0),
    total - height,
  );
  return { start, end: start + height };
}

export function FileList({
  files,
  cursor,
  height,
  showCounts,
  emptyMessage,
}: FileListProps): React.JSX.Element {
  if (files.length === 0) {
    return (
      <Box height={height}>
        <Text color={theme.text.secondary}>{`    ${emptyMessage}`}</Text>
      </Box>
    );
  }

  const { start, end } = computeWindow(files.length, cursor, height);
  return (
    <Box flexDirection="column" height={height}>
      {files.slice(start, end).map((file, offset) => (
        <FileRow
          key={file.path}
          file={file}
          isFocused={start + offset === cursor}
          showCounts={showCounts}
        />
      ))}
    </Box>
  );
}
