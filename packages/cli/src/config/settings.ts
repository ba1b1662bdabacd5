/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import {
  FatalConfigError,
  debugLogger,
  getErrorMessage,
} from '@gitstage/core';

export const SETTINGS_DIRECTORY_NAME = '.gitstage';
export const SETTINGS_FILE_NAME = 'settings.json';

const settingsSchema = z
  .object({
    ui: z
      .object({
        hideLegend: z.boolean().optional(),
        showCounts: z.boolean().optional(),
      })
      .strict()
      .optional(),
    git: z
      .object({
        path: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type Settings = z.infer<typeof settingsSchema>;

export function getUserSettingsPath(): string {
  return path.join(os.homedir(), SETTINGS_DIRECTORY_NAME, SETTINGS_FILE_NAME);
}

export function getWorkspaceSettingsPath(workspaceDir: string): string {
  return path.join(workspaceDir, SETTINGS_DIRECTORY_NAME, SETTINGS_FILE_NAME);
}

function mergeSettings(user: Settings, workspace: Settings): Settings {
  return {
    ...user,
    ...workspace,
    ui: { ...user.ui, ...workspace.ui },
    git: { ...user.git, ...workspace.git },
  };
}

function readSettingsFile(filePath: string): Settings {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      error.code === 'ENOENT'
    ) {
      return {};
    }
    throw new FatalConfigError(
      `Could not read settings file ${filePath}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new FatalConfigError(
      `Invalid JSON in settings file ${filePath}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }

  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new FatalConfigError(`Invalid settings in ${filePath}: ${issues}`);
  }
  return result.data;
}

/**
 * Loads user settings from the home directory and workspace settings from
 * `workspaceDir`, workspace values winning. The workspace file is ignored
 * when the workspace is the home directory itself.
 */
export function loadSettings(
  workspaceDir: string = process.cwd(),
): Settings {
  const userPath = getUserSettingsPath();
  const workspacePath = getWorkspaceSettingsPath(workspaceDir);
  const isHomeWorkspace =
    path.resolve(workspaceDir) === path.resolve(os.homedir());

  const user = readSettingsFile(userPath);
  const workspace: Settings = isHomeWorkspace ? {} : readSettingsFile(workspacePath);

  debugLogger.debug('[settings] loaded', {
    userPath,
    workspacePath: isHomeWorkspace ? null : workspacePath,
  });
  return mergeSettings(user, workspace);
}
