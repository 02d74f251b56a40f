#!/usr/bin/env node

/**
 * glbindgen CLI entry point.
 */

import { runCli } from './app.js';
import { withErrorHandling } from './utils/errorHandling.js';

withErrorHandling(async () => ({ exitCode: await runCli(process.argv.slice(2)) }));
