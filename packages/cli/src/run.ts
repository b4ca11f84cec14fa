#!/usr/bin/env node
/**
 * CLI entry point script.
 *
 * This is the executable entry point for the `ffmeter` command.
 *
 * @packageDocumentation
 */
import { main } from './index.js';

process.exitCode = await main(process.argv.slice(2));
