#!/usr/bin/env node
/**
 * ttlint executable.
 *
 * Usage:
 *   ttlint [--fix] [-p <pattern>]... <file...>
 */

import { runCli } from './cli.js';

process.exitCode = runCli(process.argv.slice(2));
