#!/usr/bin/env node

/**
 * groupconf CLI entry point.
 */

import { runCli } from './main.js';
import { withErrorHandling } from './utils/errorHandling.js';

void withErrorHandling(() => runCli(process.argv.slice(2)));
