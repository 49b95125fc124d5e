/**
 * @fileoverview Barrel file for CLI provider utilities
 * @module services/git/providers/cli/utils
 */

export * from './command-builder.js';
export * from './error-mapper.js';
export * from './git-executor.js';
export * from './runtime-adapter.js';
