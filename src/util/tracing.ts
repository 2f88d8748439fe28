import {
  SpanStatusCode,
  context,
  propagation,
  trace,
  type Attributes,
  type Span,
} from "@opentelemetry/api";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import {
  ConsoleSpanExporter,
  InMemorySpanExporter,
  SimpleSpanProcessor,
} from "@opentelemetry/sdk-trace-base";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { TracingConfig } from "../config/types.js";
import { TOOL_NAME, TOOL_VERSION } from "../config/constants.js";
import { toError } from "./errors.js";

/**
 * One span per import, per writer run inside it, and per read benchmark.
 * Writer spans are children of the import span that started them.
 */
export const SPAN_NAMES = {
  IMPORT: "geokv.import",
  IMPORT_MULTI: "geokv.import.multi",
  WRITER_RUN: "geokv.writer.run",
  READ_BENCHMARK: "geokv.read.benchmark",
} as const;

export type SpanAttributes = Record<string, string | number | boolean | undefined>;

interface ActiveTracing {
  provider: NodeTracerProvider;
  /** Set for the `memory` exporter, which tests read spans back from. */
  memory: InMemorySpanExporter | null;
}

let active: ActiveTracing | null = null;
let configured = false;

/**
 * Registers a global tracer provider when tracing is enabled. Only the first
 * call per process takes effect. While disabled, spans go to the API's no-op
 * tracer.
 */
export function initTracing(config: TracingConfig): void {
  if (configured) {
    return;
  }
  configured = true;
  if (!config.enabled) {
    return;
  }

  const provider = new NodeTracerProvider({
    resource: Resource.default().merge(
      new Resource({ [ATTR_SERVICE_NAME]: config.serviceName ?? TOOL_NAME }),
    ),
  });
  const memory =
    config.exporterType === "memory" ? new InMemorySpanExporter() : null;
  provider.addSpanProcessor(
    new SimpleSpanProcessor(memory ?? new ConsoleSpanExporter()),
  );
  provider.register();
  active = { provider, memory };
}

export function isTracingEnabled(): boolean {
  return active !== null;
}

export function getMemoryExporter(): InMemorySpanExporter | null {
  return active?.memory ?? null;
}

export async function shutdownTracing(): Promise<void> {
  await active?.provider.shutdown();
}

function toAttributes(attrs: SpanAttributes): Attributes {
  const result: Attributes = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Runs `fn` inside an active span, so spans opened by `fn` nest under it.
 * A throw marks the span as failed and is rethrown.
 */
export function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  attributes: SpanAttributes = {},
): Promise<T> {
  const tracer = trace.getTracer(TOOL_NAME, TOOL_VERSION);
  return tracer.startActiveSpan(
    name,
    { attributes: toAttributes(attributes) },
    async (span: Span): Promise<T> => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (err) {
        const error = toError(err);
        span.recordException(error);
        span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
        throw err;
      } finally {
        span.end();
      }
    },
  );
}

/**
 * Final counters of a run, set on its span before it ends.
 */
export function setSpanAttributes(span: Span, attributes: SpanAttributes): void {
  span.setAttributes(toAttributes(attributes));
}

export async function resetTracingForTest(): Promise<void> {
  await shutdownTracing();
  trace.disable();
  context.disable();
  propagation.disable();
  active = null;
  configured = false;
}
