/**
 * OpenTelemetry tracing utilities for the journaling pipeline
 *
 * Span helpers, attribute builders and metadata sanitization. Journal text
 * never goes into span attributes; counts, ids and stage outcomes do.
 */

import { trace, SpanStatusCode } from '@opentelemetry/api';

// ============================================================================
// Constants for standard attribute keys
// ============================================================================

export const TraceAttributes = {
  // Ownership
  USER_ID: 'userId',
  SESSION_ID: 'sessionId',
  ENTRY_ID: 'entryId',

  // Pipeline
  STAGE: 'stage',
  STAGE_OK: 'stageOk',
  INTENT: 'intent',
  TONE: 'tone',
  STRATEGY: 'strategy',
  TURN_STATE: 'turnState',
  QUALITY_FLAGGED: 'qualityFlagged',

  // Operation metadata
  OPERATION_TYPE: 'operationType',
  ENTITY_TYPE: 'entityType',
  ITEM_COUNT: 'itemCount',
  DURATION_MS: 'durationMs',

  // LLM
  MODEL: 'model',
} as const;

type AttributeValue = string | number | boolean | undefined | null;

export function getTracer() {
  return trace.getTracer('reflective-journal-backend', '0.1.0');
}

// ============================================================================
// Span wrapper for async operations
// ============================================================================

/**
 * Wrap an async function with OpenTelemetry span tracking
 *
 * @example
 * const chunks = await withSpan('retriever.retrieve', buildStageAttributes('semantic', userId), () =>
 *   chunkStore.nearest(userId, vector, k, version)
 * );
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, AttributeValue>,
  fn: () => Promise<T>
): Promise<T> {
  const tracer = getTracer();
  const sanitized = sanitizeMetadata(attributes);

  return tracer.startActiveSpan(name, { attributes: sanitized }, async (span) => {
    try {
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: errorMessage,
      });
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Attach attributes to the active span, if any
 */
export function annotateActiveSpan(attributes: Record<string, AttributeValue>): void {
  const activeSpan = trace.getActiveSpan();
  if (activeSpan) {
    activeSpan.setAttributes(sanitizeMetadata(attributes));
  }
}

// ============================================================================
// Metadata sanitization (PII filtering)
// ============================================================================

/**
 * Remove sensitive data from span attributes
 *
 * DO NOT include in spans:
 * - Message, summary or chunk text (use counts instead)
 * - API keys or tokens
 * - Raw embeddings
 */
export function sanitizeMetadata(
  metadata: Record<string, AttributeValue>
): Record<string, string | number | boolean> {
  const sanitized: Record<string, string | number | boolean> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (value === null || value === undefined) {
      continue;
    }

    const lowered = key.toLowerCase();
    if (
      lowered.includes('password') ||
      lowered.includes('secret') ||
      lowered.includes('key') ||
      lowered.includes('content') ||
      lowered.includes('message') ||
      lowered.includes('text') ||
      lowered.includes('summary') ||
      lowered.includes('embedding')
    ) {
      continue;
    }

    sanitized[key] = value;
  }

  return sanitized;
}

// ============================================================================
// Standard attribute builders
// ============================================================================

export function buildStageAttributes(
  stage: string,
  userId: string,
  options?: { itemCount?: number; sessionId?: string }
) {
  return {
    [TraceAttributes.STAGE]: stage,
    [TraceAttributes.USER_ID]: userId,
    [TraceAttributes.SESSION_ID]: options?.sessionId,
    [TraceAttributes.ITEM_COUNT]: options?.itemCount,
  };
}

export function buildEntryAttributes(
  operationType: 'create' | 'read' | 'delete' | 'enrich',
  userId: string,
  options?: { entryId?: string; sessionId?: string; itemCount?: number }
) {
  return {
    [TraceAttributes.OPERATION_TYPE]: operationType,
    [TraceAttributes.USER_ID]: userId,
    [TraceAttributes.ENTRY_ID]: options?.entryId,
    [TraceAttributes.SESSION_ID]: options?.sessionId,
    [TraceAttributes.ITEM_COUNT]: options?.itemCount,
  };
}

export function buildLLMAttributes(model: string, functionId: string) {
  return {
    [TraceAttributes.MODEL]: model,
    [TraceAttributes.OPERATION_TYPE]: functionId,
  };
}
