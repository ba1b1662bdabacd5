/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { FileStatus, type FileChange } from '@gitstage/core';
import type { Key } from '../hooks/useKeypress.js';
import { PAGE_SIZE, resolveCommand } from './keyBindings.js';
import { createStagingState, type StagingState } from './stagingState.js';

function key(name: string, overrides: Partial<Key> = {}): Key {
  return {
    name,
    ctrl: false,
    meta: false,
    shift: false,
    paste: false,
    insertable: name.length === 1,
    sequence: name.length === 1 ? name : '',
    ...overrides,
  };
}

const change: FileChange = {
  path: 'a.ts',
  indexStatus: FileStatus.Clean,
  worktreeStatus: FileStatus.Modified,
  added: 2,
  deleted: 1,
  binary: false,
};

describe('resolveCommand', () => {
  const browsing: StagingState = createStagingState([change]);

  it.each([
    ['up', { type: 'navigate', delta: -1 }],
    ['k', { type: 'navigate', delta: -1 }],
    ['down', { type: 'navigate', delta: 1 }],
    ['j', { type: 'navigate', delta: 1 }],
    ['pageup', { type: 'navigate', delta: -PAGE_SIZE }],
    ['pagedown', { type: 'navigate', delta: PAGE_SIZE }],
    ['right', { type: 'stage-selected' }],
    ['left', { type: 'unstage-selected' }],
    ['a', { type: 'stage-all' }],
    ['u', { type: 'unstage-all' }],
    ['d', { type: 'request-discard' }],
    ['r', { type: 'refresh' }],
    ['/', { type: 'filter-start' }],
    ['q', { type: 'quit' }],
    ['escape', { type: 'quit' }],
  ])('maps %s while browsing', (name, expected) => {
    expect(resolveCommand(key(name), browsing)).toEqual(expected);
  });

  it('jumps to the first row on g and the last on G', () => {
    expect(resolveCommand(key('g'), browsing)).toEqual({
      type: 'navigate-to',
      position: 'first',
    });
    expect(
      resolveCommand(key('g', { shift: true, sequence: 'G' }), browsing),
    ).toEqual({ type: 'navigate-to', position: 'last' });
  });

  it('quits on ctrl+c in every mode', () => {
    const editing = { ...browsing, filterEditing: true };
    const confirming = { ...browsing, pendingDiscard: change };

    for (const state of [browsing, editing, confirming]) {
      expect(resolveCommand(key('c', { ctrl: true }), state)).toEqual({
        type: 'quit',
      });
    }
  });

  it('quits on escape even though Ink flags it as meta', () => {
    expect(resolveCommand(key('escape', { meta: true }), browsing)).toEqual({
      type: 'quit',
    });
  });

  it('clears an applied filter on escape instead of quitting', () => {
    const filtered = { ...browsing, filter: 'src' };

    expect(resolveCommand(key('escape'), filtered)).toEqual({
      type: 'filter-clear',
    });
  });

  it('ignores unbound keys', () => {
    expect(resolveCommand(key('x'), browsing)).toBeNull();
    expect(resolveCommand(key('a', { meta: true }), browsing)).toBeNull();
  });

  describe('while editing the filter', () => {
    const editing = { ...browsing, filterEditing: true };

    it('types printable keys into the filter', () => {
      expect(resolveCommand(key('q'), editing)).toEqual({
        type: 'filter-input',
        text: 'q',
      });
    });

    it('applies, clears and deletes', () => {
      expect(resolveCommand(key('return'), editing)).toEqual({
        type: 'filter-apply',
      });
      expect(resolveCommand(key('escape'), editing)).toEqual({
        type: 'filter-clear',
      });
      expect(resolveCommand(key('backspace'), editing)).toEqual({
        type: 'filter-backspace',
      });
    });

    it('still moves the cursor with the arrow keys', () => {
      expect(resolveCommand(key('down'), editing)).toEqual({
        type: 'navigate',
        delta: 1,
      });
    });
  });

  describe('while a discard is pending', () => {
    const confirming = { ...browsing, pendingDiscard: change };

    it('confirms on y', () => {
      expect(resolveCommand(key('y'), confirming)).toEqual({
        type: 'confirm-discard',
      });
    });

    it('cancels on anything else', () => {
      expect(resolveCommand(key('n'), confirming)).toEqual({
        type: 'cancel-discard',
      });
      expect(resolveCommand(key('return'), confirming)).toEqual({
        type: 'cancel-discard',
      });
    });
  });
});
