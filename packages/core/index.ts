/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './src/git/types.js';
export * from './src/git/paths.js';
export * from './src/git/statusParser.js';
export * from './src/git/numstat.js';
export * from './src/git/reconciler.js';
export * from './src/git/repository.js';
export * from './src/git/loadCycle.js';
export * from './src/git/actions.js';
export * from './src/utils/errors.js';
export * from './src/utils/debugLogger.js';
