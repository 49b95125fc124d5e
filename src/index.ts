#!/usr/bin/env node
/**
 * @fileoverview Main entry point. The process exits with the exit code of
 * the last git command executed.
 * @module src/index
 */
import 'reflect-metadata';

import { start } from './app.js';

process.exitCode = await start(process.argv);
