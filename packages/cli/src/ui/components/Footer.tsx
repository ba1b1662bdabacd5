/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { Box, Text } from 'ink';
import { theme } from '../semantic-colors.js';
import { STAGED_ICON, WORKTREE_ICON } from './FileRow.js';

export const KEY_LEGEND =
  '↑/↓ move  •  ← unstage  •  → stage  •  a stage all  •  u unstage all  •  d discard  •  / filter  •  r refresh  •  q quit';

export const STATUS_LEGEND = `${STAGED_ICON.trim()} staged  •  ${WORKTREE_ICON.trim()} unstaged  •  counts show total +adds/-dels  •  (bin) binary`;

export function Footer(): React.JSX.Element {
  return (
    <Box flexDirection="column">
      <Text color={theme.text.secondary}>{KEY_LEGEND}</Text>
      <Text color={theme.text.secondary}>{STATUS_LEGEND}</Text>
    </Box>
  );
}
