/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Key } from '../hooks/useKeypress.js';
import type { StagingCommand, StagingState } from './stagingState.js';

export const PAGE_SIZE = 10;

function resolveFilterCommand(key: Key): StagingCommand | null {
  switch (key.name) {
    case 'return':
      return { type: 'filter-apply' };
    case 'escape':
      return { type: 'filter-clear' };
    case 'backspace':
      return { type: 'filter-backspace' };
    case 'up':
      return { type: 'navigate', delta: -1 };
    case 'down':
      return { type: 'navigate', delta: 1 };
    default:
      return key.insertable
        ? { type: 'filter-input', text: key.sequence }
        : null;
  }
}

/**
 * Maps a keypress to the command it triggers in the current state, or null
 * when the key does nothing.
 */
export function resolveCommand(
  key: Key,
  state: StagingState,
): StagingCommand | null {
  if (key.ctrl && key.name === 'c') {
    return { type: 'quit' };
  }
  if (state.pendingDiscard) {
    return key.name === 'y' && !key.ctrl && !key.meta
      ? { type: 'confirm-discard' }
      : { type: 'cancel-discard' };
  }
  if (state.filterEditing) {
    return resolveFilterCommand(key);
  }
  // Ink reports a lone escape with the meta flag set.
  if ((key.ctrl || key.meta) && key.name !== 'escape') {
    return null;
  }

  switch (key.name) {
    case 'up':
    case 'k':
      return { type: 'navigate', delta: -1 };
    case 'down':
    case 'j':
      return { type: 'navigate', delta: 1 };
    case 'pageup':
      return { type: 'navigate', delta: -PAGE_SIZE };
    case 'pagedown':
      return { type: 'navigate', delta: PAGE_SIZE };
    case 'g':
      return { type: 'navigate-to', position: key.shift ? 'last' : 'first' };
    case 'right':
      return { type: 'stage-selected' };
    case 'left':
      return { type: 'unstage-selected' };
    case 'a':
      return { type: 'stage-all' };
    case 'u':
      return { type: 'unstage-all' };
    case 'd':
      return { type: 'request-discard' };
    case 'r':
      return { type: 'refresh' };
    case '/':
      return { type: 'filter-start' };
    case 'escape':
      return state.filter !== '' ? { type: 'filter-clear' } : { type: 'quit' };
    case 'q':
      return { type: 'quit' };
    default:
      return null;
  }
}
