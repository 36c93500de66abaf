import { z } from 'zod';

export const RESOURCE_TYPES = ['file', 'folder', 'version_stack'] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

const idRef = z.object({ id: z.string().min(1) });

export const resourceSchema = z.object({
  id: z.string().min(1),
  type: z.enum(RESOURCE_TYPES),
});

export type Resource = z.infer<typeof resourceSchema>;

const baseEventShape = {
  type: z.string().min(1),
  project: idRef,
  user: idRef,
  workspace: idRef,
  timestamp: z.number().int(),
};

/**
 * Standard webhook payload (non-interactive).
 */
export const webhookEventSchema = z
  .object({
    ...baseEventShape,
    account: idRef,
    resource: resourceSchema,
  })
  .transform((payload) => ({
    kind: 'webhook' as const,
    ...payload,
    accountId: payload.account.id,
    workspaceId: payload.workspace.id,
    projectId: payload.project.id,
    userId: payload.user.id,
    resourceId: payload.resource.id,
  }));

export type WebhookEvent = z.output<typeof webhookEventSchema>;

// Older action payloads carry a single `resource` instead of `resources`.
function normalizeResources(data: unknown): unknown {
  if (typeof data === 'object' && data !== null && 'resource' in data && !('resources' in data)) {
    const { resource, ...rest } = data;
    return { ...rest, resources: [resource] };
  }
  return data;
}

/**
 * Custom action payload, including submitted form data on follow-up calls.
 */
export const actionEventSchema = z.preprocess(
  normalizeResources,
  z
    .object({
      ...baseEventShape,
      account_id: z.string().min(1),
      action_id: z.string().min(1),
      interaction_id: z.string().min(1),
      resources: z.array(resourceSchema).min(1).max(100),
      data: z.record(z.unknown()).nullable().optional(),
    })
    .transform(({ account_id, action_id, interaction_id, data, ...payload }) => ({
      kind: 'action' as const,
      ...payload,
      account: { id: account_id },
      accountId: account_id,
      actionId: action_id,
      interactionId: interaction_id,
      data: data ?? null,
      workspaceId: payload.workspace.id,
      projectId: payload.project.id,
      userId: payload.user.id,
      resourceIds: payload.resources.map((r) => r.id),
    }))
);

export type ActionEvent = z.output<typeof actionEventSchema>;

export type AnyEvent = WebhookEvent | ActionEvent;

export type EventKind = AnyEvent['kind'];
