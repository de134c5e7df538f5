#!/usr/bin/env node
/**
 * Sprig CLI entry point.
 *
 * Usage: npx ts-node interpreter/src/index.ts [program] [--trace]
 */

import { runCli } from './cli';

process.exit(runCli(process.argv.slice(2)));
