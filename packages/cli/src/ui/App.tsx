/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { useCallback, useEffect, useRef, useState } from 'react';
import { Box, Text, useApp, useStdout } from 'ink';
import { getErrorMessage, type FileChange } from '@gitstage/core';
import type { Settings } from '../config/settings.js';
import { FileList } from './components/FileList.js';
import { Footer } from './components/Footer.js';
import { useKeypress, type Key } from './hooks/useKeypress.js';
import { resolveCommand } from './state/keyBindings.js';
import {
  createStagingState,
  transition,
  visibleFiles,
  type StagingServices,
  type StagingState,
} from './state/stagingState.js';
import { theme } from './semantic-colors.js';

export const APP_TITLE = 'gitstage · interactive add/reset';

const DEFAULT_TERMINAL_ROWS = 24;
// Title, filter bar, error, prompt and the two legend lines.
const RESERVED_ROWS = 6;
const MIN_LIST_HEIGHT = 3;

interface AppProps {
  initialFiles: readonly FileChange[];
  services: StagingServices;
  settings: Settings;
}

function useTerminalRows(): number {
  const { stdout } = useStdout();
  const [rows, setRows] = useState(stdout.rows ?? DEFAULT_TERMINAL_ROWS);

  useEffect(() => {
    const handleResize = () => {
      setRows(stdout.rows ?? DEFAULT_TERMINAL_ROWS);
    };
    stdout.on('resize', handleResize);
    return () => {
      stdout.off('resize', handleResize);
    };
  }, [stdout]);

  return rows;
}

export function App({
  initialFiles,
  services,
  settings,
}: AppProps): React.JSX.Element {
  const { exit } = useApp();
  const rows = useTerminalRows();
  const [state, setState] = useState<StagingState>(() =>
    createStagingState(initialFiles),
  );
  const stateRef = useRef(state);
  // Keys that arrive while git is running are dropped.
  const isBusy = useRef(false);

  const handleKeypress = useCallback(
    (key: Key) => {
      if (isBusy.current) {
        return;
      }
      const command = resolveCommand(key, stateRef.current);
      if (!command) {
        return;
      }
      isBusy.current = true;
      void transition(stateRef.current, command, services)
        .then((next) => {
          stateRef.current = next;
          setState(next);
          if (next.exited) {
            exit();
          }
        })
        .catch((error: unknown) => {
          const next = { ...stateRef.current, error: getErrorMessage(error) };
          stateRef.current = next;
          setState(next);
        })
        .finally(() => {
          isBusy.current = false;
        });
    },
    [services, exit],
  );

  useKeypress(handleKeypress, { isActive: !state.exited });

  const files = visibleFiles(state);
  const showCounts = settings.ui?.showCounts ?? true;
  const hideLegend = settings.ui?.hideLegend ?? false;
  const listHeight = Math.max(rows - RESERVED_ROWS, MIN_LIST_HEIGHT);

  return (
    <Box flexDirection="column">
      <Text bold>{APP_TITLE}</Text>
      {(state.filterEditing || state.filter !== '') && (
        <Text color={state.filterEditing ? undefined : theme.text.secondary}>
          {`Filter: ${state.filter}${state.filterEditing ? '█' : ''}`}
        </Text>
      )}
      <FileList
        files={files}
        cursor={state.cursor}
        height={listHeight}
        showCounts={showCounts}
        emptyMessage={
          state.files.length === 0
            ? 'No changes'
            : 'No files match the filter'
        }
      />
      {state.error !== null && (
        <Text color={theme.status.error}>{`Error: ${state.error}`}</Text>
      )}
      {state.pendingDiscard !== null && (
        <Text color={theme.status.warning}>
          {`Discard working changes to ${state.pendingDiscard.path}? (y/N)`}
        </Text>
      )}
      {!hideLegend && <Footer />}
    </Box>
  );
}
