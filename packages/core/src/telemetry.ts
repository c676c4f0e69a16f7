import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { SpanStatusCode, trace } from '@opentelemetry/api';
import type { Attributes, Tracer } from '@opentelemetry/api';

let sdk: NodeSDK | undefined;

/**
 * Start the OpenTelemetry SDK with an OTLP gRPC trace exporter.
 *
 * No-op when neither `otlpEndpoint` nor `OTEL_EXPORTER_OTLP_ENDPOINT` is set;
 * the API then hands out no-op tracers.
 */
export function initTelemetry(opts: { serviceName: string; otlpEndpoint?: string }): void {
  if (sdk) {
    throw new Error('initTelemetry() has already been called. Call shutdownTelemetry() first.');
  }

  const endpoint = opts.otlpEndpoint ?? process.env['OTEL_EXPORTER_OTLP_ENDPOINT'];
  if (!endpoint) return;

  sdk = new NodeSDK({
    serviceName: opts.serviceName,
    traceExporter: new OTLPTraceExporter({ url: endpoint }),
  });
  sdk.start();
}

/** Flush and stop the SDK. Resolves immediately if it was never started. */
export async function shutdownTelemetry(): Promise<void> {
  const instance = sdk;
  sdk = undefined;
  await instance?.shutdown();
}

/** Obtain a Tracer scoped to the given name (usually the package name). */
export function getTracer(name: string): Tracer {
  return trace.getTracer(name);
}

/** Run `fn` inside a span, recording failure status before rethrowing. */
export async function withSpan<T>(
  tracer: Tracer,
  name: string,
  attributes: Attributes,
  fn: () => Promise<T>,
): Promise<T> {
  const span = tracer.startSpan(name, { attributes });
  try {
    const result = await fn();
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (err) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: err instanceof Error ? err.message : String(err) });
    throw err;
  } finally {
    span.end();
  }
}
