/**
 * @fileoverview Defines all dependency injection tokens for the application.
 * @module src/container/tokens
 */

export const AppConfig = Symbol('AppConfig');
export const GitProvider = Symbol('IGitProvider');
export const StatusWriter = Symbol('StatusWriter');
export const SyncRunnerToken = Symbol('SyncRunner');
