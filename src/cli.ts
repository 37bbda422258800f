#!/usr/bin/env node
/**
 * CLI Entry Point — bangdoc
 *
 * Usage:
 *   bangdoc generate [-s <dir>] [-o <file>] [-f json|yaml] [--indent <n>] [-c <config>] [--debug]
 *
 * @module
 */
import { runCli } from './cli/commands.js';

process.exitCode = await runCli(process.argv);
