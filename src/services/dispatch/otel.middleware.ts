import { Attributes, SpanKind, SpanStatusCode, TracerProvider, trace } from '@opentelemetry/api';
import { AnyEvent } from '../../types/event.types';
import { Middleware } from './event-app';

export const DEFAULT_TRACER_NAME = 'frameio-event-kit';

export interface OpenTelemetryOptions {
  tracerName?: string;
  /** Defaults to the globally registered provider. */
  tracerProvider?: TracerProvider;
}

function eventAttributes(event: AnyEvent): Attributes {
  const resource = event.kind === 'webhook' ? event.resource : event.resources[0];
  const attributes: Attributes = {
    'frameio.event.type': event.type,
    'frameio.account.id': event.accountId,
    'frameio.resource.id': resource.id,
    'frameio.resource.type': resource.type,
    'frameio.user.id': event.userId,
    'frameio.project.id': event.projectId,
    'frameio.workspace.id': event.workspaceId,
  };
  if (event.kind === 'action') {
    attributes['frameio.action.id'] = event.actionId;
    attributes['frameio.interaction.id'] = event.interactionId;
  }
  return attributes;
}

/**
 * Wraps each event in a SERVER span named `frameio <event type>`. A handler
 * error is recorded on the span and rethrown.
 *
 * @example
 * app.use(openTelemetryMiddleware({ tracerName: 'transcriber' }));
 */
export function openTelemetryMiddleware(options: OpenTelemetryOptions = {}): Middleware {
  const name = options.tracerName ?? DEFAULT_TRACER_NAME;
  const tracer = options.tracerProvider ? options.tracerProvider.getTracer(name) : trace.getTracer(name);

  return (event, _ctx, next) =>
    tracer.startActiveSpan(
      `frameio ${event.type}`,
      { kind: SpanKind.SERVER, attributes: eventAttributes(event) },
      async (span) => {
        try {
          const result = await next();
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          span.recordException(error instanceof Error ? error : message);
          span.setStatus({ code: SpanStatusCode.ERROR, message });
          throw error;
        } finally {
          span.end();
        }
      }
    );
}
