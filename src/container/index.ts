/**
 * @fileoverview Centralized dependency injection container setup.
 * `composeContainer` is the composition root; this file also re-exports the
 * container instance and all DI tokens.
 * @module src/container
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { registerCoreServices } from './registrations/core.js';

let isContainerComposed = false;

/**
 * Composes the DI container by registering all services. Safe to call more
 * than once; only the first call registers.
 */
export function composeContainer(): void {
  if (isContainerComposed) {
    return;
  }

  registerCoreServices();

  isContainerComposed = true;
}

export * from './tokens.js';
export default container;
