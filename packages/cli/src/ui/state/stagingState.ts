/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  debugLogger,
  getErrorMessage,
  hasWorktreeChanges,
  type FileChange,
  type GitActions,
} from '@gitstage/core';

/**
 * Everything the staging screen shows. Values are replaced, never mutated:
 * each transition returns a new state.
 */
export interface StagingState {
  readonly files: readonly FileChange[];
  /** Index into the visible (filtered) files; -1 when nothing is selected. */
  readonly cursor: number;
  readonly filter: string;
  readonly filterEditing: boolean;
  /** File waiting for a y/N answer before its worktree changes are dropped. */
  readonly pendingDiscard: FileChange | null;
  /** Last failure, shown above the legend until the next successful load. */
  readonly error: string | null;
  readonly exited: boolean;
}

export type StagingCommand =
  | { type: 'navigate'; delta: number }
  | { type: 'navigate-to'; position: 'first' | 'last' }
  | { type: 'refresh' }
  | { type: 'stage-selected' }
  | { type: 'unstage-selected' }
  | { type: 'stage-all' }
  | { type: 'unstage-all' }
  | { type: 'request-discard' }
  | { type: 'confirm-discard' }
  | { type: 'cancel-discard' }
  | { type: 'filter-start' }
  | { type: 'filter-input'; text: string }
  | { type: 'filter-backspace' }
  | { type: 'filter-apply' }
  | { type: 'filter-clear' }
  | { type: 'quit' };

export interface StagingServices {
  /** Runs a full load cycle against the repository. */
  load(): Promise<FileChange[]>;
  actions: Pick<GitActions, 'stage' | 'unstage' | 'discard'>;
}

export function createStagingState(
  files: readonly FileChange[],
): StagingState {
  return {
    files,
    cursor: files.length > 0 ? 0 : -1,
    filter: '',
    filterEditing: false,
    pendingDiscard: null,
    error: null,
    exited: false,
  };
}

export function visibleFiles(state: StagingState): readonly FileChange[] {
  if (state.filter === '') {
    return state.files;
  }
  const needle = state.filter.toLowerCase();
  return state.files.filter((file) =>
    file.path.toLowerCase().includes(needle),
  );
}

export function selectedFile(state: StagingState): FileChange | undefined {
  if (state.cursor < 0) {
    return undefined;
  }
  return visibleFiles(state)[state.cursor];
}

function clampCursor(state: StagingState, target: number): StagingState {
  const count = visibleFiles(state).length;
  const cursor = count === 0 ? -1 : Math.min(Math.max(target, 0), count - 1);
  return cursor === state.cursor ? state : { ...state, cursor };
}

function withFilter(
  state: StagingState,
  filter: string,
  filterEditing: boolean,
): StagingState {
  const next = { ...state, filter, filterEditing };
  return { ...next, cursor: visibleFiles(next).length > 0 ? 0 : -1 };
}

function withError(state: StagingState, error: unknown): StagingState {
  debugLogger.debug('[staging] operation failed', error);
  return { ...state, error: getErrorMessage(error) };
}

/**
 * Replaces the file list with a fresh load cycle. On failure the current
 * list stays on screen and the error is shown instead.
 */
async function refresh(
  state: StagingState,
  services: StagingServices,
): Promise<StagingState> {
  let files: FileChange[];
  try {
    files = await services.load();
  } catch (error) {
    return withError(state, error);
  }
  return clampCursor({ ...state, files, error: null }, state.cursor);
}

/**
 * Runs a repository mutation and reloads afterwards. A failed mutation
 * skips the reload so the error stays visible. If the reload itself fails,
 * the pre-mutation list is kept even though it may now be stale.
 */
async function mutate(
  state: StagingState,
  services: StagingServices,
  operation: () => Promise<void>,
): Promise<StagingState> {
  try {
    await operation();
  } catch (error) {
    return withError(state, error);
  }
  return refresh(state, services);
}

async function mutateSelected(
  state: StagingState,
  services: StagingServices,
  operation: (paths: readonly string[]) => Promise<void>,
): Promise<StagingState> {
  const file = selectedFile(state);
  if (!file) {
    return state;
  }
  return mutate(state, services, () => operation([file.path]));
}

async function mutateVisible(
  state: StagingState,
  services: StagingServices,
  operation: (paths: readonly string[]) => Promise<void>,
): Promise<StagingState> {
  const paths = visibleFiles(state).map((file) => file.path);
  if (paths.length === 0) {
    return state;
  }
  return mutate(state, services, () => operation(paths));
}

/**
 * Applies one command and resolves with the next state. Repository
 * failures end up in `error`; this function does not reject.
 */
export async function transition(
  state: StagingState,
  command: StagingCommand,
  services: StagingServices,
): Promise<StagingState> {
  const { actions } = services;
  switch (command.type) {
    case 'navigate':
      return clampCursor(state, state.cursor + command.delta);
    case 'navigate-to':
      return clampCursor(
        state,
        command.position === 'first' ? 0 : visibleFiles(state).length - 1,
      );
    case 'refresh':
      return refresh(state, services);
    case 'stage-selected':
      return mutateSelected(state, services, (paths) => actions.stage(paths));
    case 'unstage-selected':
      return mutateSelected(state, services, (paths) =>
        actions.unstage(paths),
      );
    case 'stage-all':
      return mutateVisible(state, services, (paths) => actions.stage(paths));
    case 'unstage-all':
      return mutateVisible(state, services, (paths) => actions.unstage(paths));
    case 'request-discard': {
      const file = selectedFile(state);
      if (!file || !hasWorktreeChanges(file)) {
        return state;
      }
      return { ...state, pendingDiscard: file };
    }
    case 'confirm-discard': {
      const file = state.pendingDiscard;
      if (!file) {
        return state;
      }
      return mutate({ ...state, pendingDiscard: null }, services, () =>
        actions.discard([file]),
      );
    }
    case 'cancel-discard':
      return { ...state, pendingDiscard: null };
    case 'filter-start':
      return { ...state, filterEditing: true };
    case 'filter-input':
      return withFilter(state, state.filter + command.text, true);
    case 'filter-backspace':
      return withFilter(state, state.filter.slice(0, -1), true);
    case 'filter-apply':
      return { ...state, filterEditing: false };
    case 'filter-clear':
      return withFilter(state, '', false);
    case 'quit':
      return { ...state, exited: true };
    default: {
      const unknownCommand: never = command;
      throw new Error(`Unhandled command: ${JSON.stringify(unknownCommand)}`);
    }
  }
}
