import { ActionManifestEntry, HandlerManifest, Installation, InstallationDiff } from '../../types/installation.types';

/**
 * Snapshot of the registered handlers. Webhook event types are
 * deduplicated and sorted; actions keep registration order.
 */
export function buildManifest(
  webhookEventTypes: Iterable<string>,
  actions: Iterable<ActionManifestEntry>
): HandlerManifest {
  return {
    webhookEvents: [...new Set(webhookEventTypes)].sort(),
    actions: [...actions].map((action) => ({ ...action })),
  };
}

function sortedDifference(left: Iterable<string>, right: Set<string>): string[] {
  return [...new Set(left)].filter((value) => !right.has(value)).sort();
}

/**
 * Compare what the process declares against what is registered.
 *
 * Webhook events compare as sets and come back sorted. Actions are matched by
 * event type; ids and secrets never take part in the comparison.
 */
export function computeDiff(manifest: HandlerManifest, existing: Installation): InstallationDiff {
  const declaredEvents = new Set(manifest.webhookEvents);
  const registeredEvents = new Set(existing.webhook?.events ?? []);

  const webhookEventsAdded = sortedDifference(declaredEvents, registeredEvents);
  const webhookEventsRemoved = sortedDifference(registeredEvents, declaredEvents);

  const registeredActions = new Map(existing.actions.map((action) => [action.eventType, action]));
  const declaredTypes = new Set(manifest.actions.map((action) => action.eventType));

  const actionsAdded: ActionManifestEntry[] = [];
  const actionsModified: ActionManifestEntry[] = [];
  for (const entry of manifest.actions) {
    const current = registeredActions.get(entry.eventType);
    if (!current) {
      actionsAdded.push(entry);
    } else if (current.name !== entry.name || current.description !== entry.description) {
      actionsModified.push(entry);
    }
  }

  const actionsRemoved = existing.actions.filter((action) => !declaredTypes.has(action.eventType));

  return {
    webhookEventsAdded,
    webhookEventsRemoved,
    actionsAdded,
    actionsRemoved,
    actionsModified,
    hasChanges:
      webhookEventsAdded.length > 0 ||
      webhookEventsRemoved.length > 0 ||
      actionsAdded.length > 0 ||
      actionsRemoved.length > 0 ||
      actionsModified.length > 0,
  };
}
