/**
 * @fileoverview Utilities for creating request contexts. A request context
 * carries a unique ID, a timestamp and any operation-specific data, and is
 * attached to every log record written during a sync run.
 * @module src/utils/internal/requestContext
 */
import { generateRequestContextId } from '../security/idGenerator.js';

/**
 * Core structure for context information associated with an operation.
 */
export interface RequestContext {
  /** Unique ID for log correlation. */
  requestId: string;

  /** ISO 8601 timestamp of when the context was created. */
  timestamp: string;

  /** Arbitrary extra data; consumers must narrow before use. */
  [key: string]: unknown;
}

/**
 * Parameters for creating a new request context.
 */
export interface CreateRequestContextParams {
  /**
   * Parent context to inherit from. Its `requestId` is kept, so every step
   * of a run logs under the same ID.
   */
  parentContext?: RequestContext | Record<string, unknown>;

  /** Key-value pairs merged over the inherited properties. */
  additionalContext?: Record<string, unknown>;

  /** Name of the operation creating this context. */
  operation?: string;
}

export const requestContextService = {
  /**
   * Creates a new {@link RequestContext}. Accepts either
   * {@link CreateRequestContextParams} or a plain object whose properties
   * become part of the context.
   */
  createRequestContext(
    params: CreateRequestContextParams & Record<string, unknown> = {},
  ): RequestContext {
    const { parentContext, additionalContext, operation, ...rest } = params;

    const inheritedContext: Record<string, unknown> =
      parentContext && typeof parentContext === 'object'
        ? { ...parentContext }
        : {};

    const requestId =
      typeof inheritedContext.requestId === 'string' &&
      inheritedContext.requestId
        ? inheritedContext.requestId
        : generateRequestContextId();

    return {
      ...inheritedContext,
      ...rest,
      ...(additionalContext ?? {}),
      requestId,
      timestamp: new Date().toISOString(),
      ...(operation ? { operation } : {}),
    };
  },
};
