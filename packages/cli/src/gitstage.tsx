/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import {
  GitActions,
  GitCliRepository,
  debugLogger,
  loadFileChanges,
} from '@gitstage/core';
import { loadSettings } from './config/settings.js';
import { App } from './ui/App.js';
import type { StagingServices } from './ui/state/stagingState.js';

/**
 * Loads settings and the initial file list for the current directory, then
 * hands control to the staging screen until the user quits. A failure
 * before the screen opens (no repository, bad settings) rejects.
 */
export async function main(
  workspaceDir: string = process.cwd(),
): Promise<void> {
  const settings = loadSettings(workspaceDir);
  const repository = new GitCliRepository({
    cwd: workspaceDir,
    gitPath: settings.git?.path,
  });
  const services: StagingServices = {
    load: () => loadFileChanges(repository),
    actions: new GitActions(repository),
  };

  const initialFiles = await services.load();
  debugLogger.debug('[main] starting staging screen', {
    workspaceDir,
    files: initialFiles.length,
  });

  const instance = render(
    <App
      initialFiles={initialFiles}
      services={services}
      settings={settings}
    />,
  );
  await instance.waitUntilExit();
}
