/**
 * @fileoverview Unit tests for the requestContextService utilities.
 * @module tests/utils/internal/requestContext.test
 */
import { describe, expect, it } from 'vitest';

import { requestContextService } from '../../../src/utils/internal/requestContext.js';

describe('requestContextService', () => {
  it('creates a context with a generated ID, timestamp and operation', () => {
    const context = requestContextService.createRequestContext({
      operation: 'SyncRunner.run',
    });

    expect(context.requestId).toMatch(/^[A-Z0-9]{5}-[A-Z0-9]{5}$/);
    expect(new Date(context.timestamp).toISOString()).toBe(context.timestamp);
    expect(context.operation).toBe('SyncRunner.run');
  });

  it('inherits the parent requestId and merges additional context', () => {
    const parent = requestContextService.createRequestContext({
      operation: 'parent',
      remote: 'origin',
    });

    const child = requestContextService.createRequestContext({
      parentContext: parent,
      additionalContext: { remote: 'upstream', step: 'push' },
      operation: 'child',
    });

    expect(child.requestId).toBe(parent.requestId);
    expect(child.remote).toBe('upstream');
    expect(child.step).toBe('push');
    expect(child.operation).toBe('child');
  });

  it('keeps plain properties passed directly', () => {
    const context = requestContextService.createRequestContext({
      triggerEvent: 'SIGINT',
    });

    expect(context.triggerEvent).toBe('SIGINT');
    expect(context).not.toHaveProperty('parentContext');
    expect(context).not.toHaveProperty('additionalContext');
  });
});
