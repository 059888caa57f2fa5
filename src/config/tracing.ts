/**
 * OpenTelemetry tracing configuration
 *
 * Modes:
 * - 'console': Logs spans to stdout (default in development)
 * - 'disabled': No tracing (default otherwise)
 *
 * Environment Variables:
 * - TRACING_MODE: 'console' | 'disabled'
 */

import { ConsoleSpanExporter } from '@opentelemetry/sdk-trace-base';
import { registerOTel } from '@vercel/otel';
import type { TracingMode } from './env.js';

/**
 * Initialize OpenTelemetry tracing
 *
 * Call once at process entry, before any pipeline work.
 */
export function initTracing(mode: TracingMode): void {
  if (mode === 'disabled') {
    console.log('[Tracing] Disabled');
    return;
  }

  registerOTel({
    serviceName: 'reflective-journal-backend',
    traceExporter: new ConsoleSpanExporter(),
  });
  console.log('[Tracing] Enabled with console exporter (logs to stdout)');
}
