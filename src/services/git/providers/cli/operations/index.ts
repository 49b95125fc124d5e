/**
 * @fileoverview Barrel file for CLI provider operations
 * @module services/git/providers/cli/operations
 */

export { executeStatus } from './core/status.js';
export { executeAdd } from './staging/add.js';
export { executeCommit } from './commits/commit.js';
export { executePull } from './remotes/pull.js';
export { executePush } from './remotes/push.js';
