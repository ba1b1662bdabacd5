/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

const RENAME_ARROW = ' => ';

const ESCAPED_BYTES: Readonly<Record<string, number>> = {
  a: 0x07,
  b: 0x08,
  t: 0x09,
  n: 0x0a,
  v: 0x0b,
  f: 0x0c,
  r: 0x0d,
  '"': 0x22,
  '\\': 0x5c,
};

/**
 * Decodes a path git wrapped in double quotes because it contains special
 * or non-ASCII characters. Unquoted paths are returned unchanged.
 */
export function decodeGitPath(path: string): string {
  if (path.length < 2 || !path.startsWith('"') || !path.endsWith('"')) {
    return path;
  }
  const inner = path.slice(1, -1);
  const bytes: number[] = [];
  for (let i = 0; i < inner.length; i++) {
    const char = inner[i];
    if (char !== '\\' || i + 1 >= inner.length) {
      bytes.push(...Buffer.from(char, 'utf8'));
      continue;
    }
    const octal = /^[0-7]{1,3}/.exec(inner.slice(i + 1, i + 4));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += octal[0].length;
      continue;
    }
    const next = inner[i + 1];
    i++;
    const escaped = ESCAPED_BYTES[next];
    if (escaped !== undefined) {
      bytes.push(escaped);
    } else {
      bytes.push(0x5c, ...Buffer.from(next, 'utf8'));
    }
  }
  return Buffer.from(bytes).toString('utf8');
}

/**
 * Resolves the rename notations numstat prints inside a single path field
 * to the destination path:
 *
 *   `old.ts => new.ts`          -> `new.ts`
 *   `src/{old => new}/index.ts` -> `src/new/index.ts`
 *   `src/{ => lib}/index.ts`    -> `src/lib/index.ts`
 *   `{lib => }/index.ts`        -> `index.ts`
 *
 * Works on the field as git printed it, so a quoted destination comes back
 * still quoted: `"a\303\251" => "b\303\251"` gives `"b\303\251"`. Pass
 * the result through {@link decodeGitPath}.
 */
export function resolveRenameDestination(field: string): string {
  const open = field.indexOf('{');
  const close = field.indexOf('}', open);
  if (open >= 0 && close > open) {
    const inner = field.slice(open + 1, close);
    const arrow = inner.indexOf(RENAME_ARROW);
    if (arrow >= 0) {
      const prefix = field.slice(0, open);
      const suffix = field.slice(close + 1);
      const destination = inner.slice(arrow + RENAME_ARROW.length);
      return `${prefix}${destination}${suffix}`
        .replace(/\/{2,}/g, '/')
        .replace(/^("?)\//, '$1');
    }
  }
  const arrow = field.lastIndexOf(RENAME_ARROW);
  if (arrow >= 0) {
    return field.slice(arrow + RENAME_ARROW.length);
  }
  return field;
}
