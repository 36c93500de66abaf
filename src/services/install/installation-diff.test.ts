import { describe, it, expect } from 'vitest';
import { HandlerManifest, Installation } from '../../types/installation.types';
import { buildManifest, computeDiff } from './installation-diff';

function installation(overrides: Partial<Installation> = {}): Installation {
  return {
    accountId: 'acc',
    workspaceId: 'ws',
    installedAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
    installedByUserId: 'admin',
    status: 'active',
    webhook: { webhookId: 'wh-1', secret: 's', events: ['file.ready', 'file.deleted'], url: 'https://app.example.test/' },
    actions: [
      { actionId: 'act-1', secret: 's1', eventType: 'a.one', name: 'One', description: 'first', url: 'https://app.example.test/' },
      { actionId: 'act-2', secret: 's2', eventType: 'a.two', name: 'Two', description: 'second', url: 'https://app.example.test/' },
      { actionId: 'act-3', secret: 's3', eventType: 'a.old', name: 'Old', description: '', url: 'https://app.example.test/' },
    ],
    ...overrides,
  };
}

describe('computeDiff', () => {
  it('reports every kind of change', () => {
    const manifest: HandlerManifest = {
      webhookEvents: ['file.ready', 'comment.created'],
      actions: [
        { eventType: 'a.one', name: 'One', description: 'first' },
        { eventType: 'a.two', name: 'Two (v2)', description: 'second' },
        { eventType: 'a.new', name: 'New', description: 'added' },
      ],
    };
    const existing = installation();

    expect(computeDiff(manifest, existing)).toEqual({
      webhookEventsAdded: ['comment.created'],
      webhookEventsRemoved: ['file.deleted'],
      actionsAdded: [{ eventType: 'a.new', name: 'New', description: 'added' }],
      actionsRemoved: [existing.actions[2]],
      actionsModified: [{ eventType: 'a.two', name: 'Two (v2)', description: 'second' }],
      hasChanges: true,
    });
  });

  it('treats webhook events as an unordered set', () => {
    const manifest: HandlerManifest = {
      webhookEvents: ['file.deleted', 'file.ready', 'file.ready'],
      actions: installation().actions.map(({ eventType, name, description }) => ({ eventType, name, description })),
    };

    const diff = computeDiff(manifest, installation());
    expect(diff.hasChanges).toBe(false);
    expect(diff.webhookEventsAdded).toEqual([]);
    expect(diff.webhookEventsRemoved).toEqual([]);
  });

  it('flags a description-only change as a modification', () => {
    const manifest: HandlerManifest = {
      webhookEvents: ['file.ready', 'file.deleted'],
      actions: [
        { eventType: 'a.one', name: 'One', description: 'changed' },
        { eventType: 'a.two', name: 'Two', description: 'second' },
        { eventType: 'a.old', name: 'Old', description: '' },
      ],
    };
    expect(computeDiff(manifest, installation()).actionsModified).toEqual([
      { eventType: 'a.one', name: 'One', description: 'changed' },
    ]);
  });

  it('reports all manifest events as added, sorted, when no webhook exists', () => {
    const manifest: HandlerManifest = { webhookEvents: ['z.event', 'a.event'], actions: [] };
    const diff = computeDiff(manifest, installation({ webhook: null, actions: [] }));

    expect(diff.webhookEventsAdded).toEqual(['a.event', 'z.event']);
    expect(diff.hasChanges).toBe(true);
  });
});

describe('buildManifest', () => {
  it('deduplicates and sorts webhook events but keeps action order', () => {
    const manifest = buildManifest(
      ['file.ready', 'comment.created', 'file.ready'],
      [
        { eventType: 'b.action', name: 'B', description: '' },
        { eventType: 'a.action', name: 'A', description: '' },
      ]
    );

    expect(manifest.webhookEvents).toEqual(['comment.created', 'file.ready']);
    expect(manifest.actions.map((a) => a.eventType)).toEqual(['b.action', 'a.action']);
  });
});
