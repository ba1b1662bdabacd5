/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { useInput, type Key as InkKey } from 'ink';

export interface Key {
  name: string;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
  paste: boolean;
  /** True when the key produces text that can be typed into a field. */
  insertable: boolean;
  sequence: string;
}

/** The subset of Ink's key flags gitstage looks at. */
export type InkKeyFlags = Pick<
  InkKey,
  | 'upArrow'
  | 'downArrow'
  | 'leftArrow'
  | 'rightArrow'
  | 'pageUp'
  | 'pageDown'
  | 'return'
  | 'escape'
  | 'ctrl'
  | 'shift'
  | 'tab'
  | 'backspace'
  | 'delete'
  | 'meta'
>;

function keyName(input: string, key: InkKeyFlags): string {
  if (key.upArrow) return 'up';
  if (key.downArrow) return 'down';
  if (key.leftArrow) return 'left';
  if (key.rightArrow) return 'right';
  if (key.pageUp) return 'pageup';
  if (key.pageDown) return 'pagedown';
  if (key.return) return 'return';
  if (key.escape) return 'escape';
  if (key.tab) return 'tab';
  // Most terminals send DEL for the backspace key.
  if (key.backspace || key.delete) return 'backspace';
  return input.length === 1 ? input.toLowerCase() : '';
}

export function toKey(input: string, key: InkKeyFlags): Key {
  const name = keyName(input, key);
  const shift =
    key.shift || (input.length === 1 && input !== input.toLowerCase());
  return {
    name,
    ctrl: key.ctrl,
    meta: key.meta,
    shift,
    paste: input.length > 1,
    insertable:
      input.length > 0 &&
      !key.ctrl &&
      !key.meta &&
      !key.escape &&
      !key.return &&
      !key.tab &&
      !key.backspace &&
      !key.delete &&
      !/[\u0000-\u001f\u007f]/.test(input),
    sequence: input,
  };
}

/**
 * Subscribes `onKeypress` to terminal input while `isActive` is true.
 */
export function useKeypress(
  onKeypress: (key: Key) => void,
  { isActive }: { isActive: boolean },
): void {
  useInput(
    (input, key) => {
      onKeypress(toKey(input, key));
    },
    { isActive },
  );
}
