#!/usr/bin/env node

import { runCli } from './cli/index.js';
import { getErrorMessage } from './utils/error-utils.js';

runCli().catch((error: unknown) => {
  console.error('Fatal error:', getErrorMessage(error));
  process.exit(1);
});
