/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as osActual from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FatalConfigError } from '@gitstage/core';
import {
  getUserSettingsPath,
  loadSettings,
  SETTINGS_DIRECTORY_NAME,
  SETTINGS_FILE_NAME,
} from './settings.js';

const mocks = vi.hoisted(() => ({
  homedir: vi.fn(),
}));

vi.mock('node:os', async (importOriginal) => {
  const actualOs = await importOriginal<typeof osActual>();
  return {
    ...actualOs,
    homedir: mocks.homedir,
  };
});

function writeSettings(dir: string, content: string): string {
  const settingsDir = path.join(dir, SETTINGS_DIRECTORY_NAME);
  fs.mkdirSync(settingsDir, { recursive: true });
  const filePath = path.join(settingsDir, SETTINGS_FILE_NAME);
  fs.writeFileSync(filePath, content);
  return filePath;
}

describe('loadSettings', () => {
  let tempHomeDir: string;
  let tempWorkspaceDir: string;

  beforeEach(() => {
    tempHomeDir = fs.mkdtempSync(
      path.join(osActual.tmpdir(), 'gitstage-test-home-'),
    );
    tempWorkspaceDir = fs.mkdtempSync(
      path.join(osActual.tmpdir(), 'gitstage-test-workspace-'),
    );
    mocks.homedir.mockReturnValue(tempHomeDir);
  });

  afterEach(() => {
    fs.rmSync(tempHomeDir, { recursive: true, force: true });
    fs.rmSync(tempWorkspaceDir, { recursive: true, force: true });
  });

  it('returns empty settings when no files exist', () => {
    const settings = loadSettings(tempWorkspaceDir);

    expect(settings).toEqual({ ui: {}, git: {} });
    expect(getUserSettingsPath()).toBe(
      path.join(tempHomeDir, '.gitstage', 'settings.json'),
    );
  });

  it('lets workspace values override user values key by key', () => {
    writeSettings(
      tempHomeDir,
      JSON.stringify({
        ui: { hideLegend: true, showCounts: false },
        git: { path: '/usr/bin/git' },
      }),
    );
    writeSettings(
      tempWorkspaceDir,
      JSON.stringify({ ui: { showCounts: true } }),
    );

    const settings = loadSettings(tempWorkspaceDir);

    expect(settings).toEqual({
      ui: { hideLegend: true, showCounts: true },
      git: { path: '/usr/bin/git' },
    });
  });

  it('reads the workspace file on its own when there is no user file', () => {
    writeSettings(tempWorkspaceDir, JSON.stringify({ git: { path: 'git2' } }));

    expect(loadSettings(tempWorkspaceDir)).toEqual({
      ui: {},
      git: { path: 'git2' },
    });
  });

  it('ignores the workspace file when the workspace is the home directory', () => {
    writeSettings(tempHomeDir, JSON.stringify({ ui: { hideLegend: true } }));

    const settings = loadSettings(tempHomeDir);

    expect(settings).toEqual({ ui: { hideLegend: true }, git: {} });
  });

  it('throws FatalConfigError for invalid JSON', () => {
    const filePath = writeSettings(tempWorkspaceDir, '{ "ui": ');

    expect(() => loadSettings(tempWorkspaceDir)).toThrow(FatalConfigError);
    expect(() => loadSettings(tempWorkspaceDir)).toThrow(
      `Invalid JSON in settings file ${filePath}`,
    );
  });

  it('throws FatalConfigError naming the offending key', () => {
    const filePath = writeSettings(
      tempWorkspaceDir,
      JSON.stringify({ ui: { showCounts: 'yes' } }),
    );

    try {
      loadSettings(tempWorkspaceDir);
      throw new Error('loadSettings should have thrown a FatalConfigError');
    } catch (e) {
      expect(e).toBeInstanceOf(FatalConfigError);
      const error = e as FatalConfigError;
      expect(error.exitCode).toBe(52);
      expect(error.message).toBe(
        `Invalid settings in ${filePath}: ui.showCounts: Expected boolean, received string`,
      );
    }
  });

  it('rejects unknown keys', () => {
    writeSettings(tempHomeDir, JSON.stringify({ theme: 'dark' }));

    expect(() => loadSettings(tempWorkspaceDir)).toThrow(
      /Invalid settings in .*: <root>: Unrecognized key\(s\) in object: 'theme'/,
    );
  });
});
