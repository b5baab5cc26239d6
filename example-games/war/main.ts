#!/usr/bin/env node
/**
 * War -- process entry point. See ./cli.ts for usage.
 */
import { runCli } from './cli';

process.exitCode = runCli(process.argv.slice(2));
