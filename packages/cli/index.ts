#!/usr/bin/env node

/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { FatalError, getErrorMessage } from '@gitstage/core';
import { main } from './src/gitstage.js';

main().catch((error: unknown) => {
  process.stderr.write(`gitstage: ${getErrorMessage(error)}\n`);
  process.exit(error instanceof FatalError ? error.exitCode : 1);
});
