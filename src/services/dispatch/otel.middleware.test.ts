import { beforeEach, describe, it, expect } from 'vitest';
import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import { BasicTracerProvider, InMemorySpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { ACCOUNT_ID, WORKSPACE_ID, actionEvent, webhookEvent } from '../../test-utils/events';
import { message } from '../../types/response.types';
import { createHandlerContext } from './handler-context';
import { openTelemetryMiddleware } from './otel.middleware';

const BASE_URL = 'https://app.example.test';

describe('openTelemetryMiddleware', () => {
  let exporter: InMemorySpanExporter;
  let provider: BasicTracerProvider;

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new BasicTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
  });

  it('records a server span with the webhook attributes', async () => {
    const event = webhookEvent();
    const middleware = openTelemetryMiddleware({ tracerProvider: provider });

    await middleware(event, createHandlerContext(event, BASE_URL, null), async () => undefined);

    const [span] = exporter.getFinishedSpans();
    expect(exporter.getFinishedSpans()).toHaveLength(1);
    expect(span.name).toBe('frameio file.ready');
    expect(span.kind).toBe(SpanKind.SERVER);
    expect(span.status.code).toBe(SpanStatusCode.OK);
    expect(span.instrumentationLibrary.name).toBe('frameio-event-kit');
    expect(span.attributes).toEqual({
      'frameio.event.type': 'file.ready',
      'frameio.account.id': ACCOUNT_ID,
      'frameio.resource.id': 'file-1',
      'frameio.resource.type': 'file',
      'frameio.user.id': 'user-1',
      'frameio.project.id': 'project-1',
      'frameio.workspace.id': WORKSPACE_ID,
    });
  });

  it('adds action and interaction ids and passes the result through', async () => {
    const event = actionEvent();
    const middleware = openTelemetryMiddleware({ tracerName: 'transcriber', tracerProvider: provider });

    const result = await middleware(event, createHandlerContext(event, BASE_URL, null), async () => message('Done', 'ok'));

    expect(result).toEqual({ kind: 'message', title: 'Done', description: 'ok' });
    const [span] = exporter.getFinishedSpans();
    expect(span.instrumentationLibrary.name).toBe('transcriber');
    expect(span.attributes['frameio.action.id']).toBe('action-1');
    expect(span.attributes['frameio.interaction.id']).toBe('interaction-1');
  });

  it('marks the span as failed and rethrows handler errors', async () => {
    const event = actionEvent();
    const middleware = openTelemetryMiddleware({ tracerProvider: provider });

    await expect(
      middleware(event, createHandlerContext(event, BASE_URL, null), async () => {
        throw new Error('transcoder offline');
      })
    ).rejects.toThrow('transcoder offline');

    const [span] = exporter.getFinishedSpans();
    expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: 'transcoder offline' });
    expect(span.events.map((e) => e.name)).toEqual(['exception']);
    expect(span.events[0].attributes?.['exception.message']).toBe('transcoder offline');
  });
});
