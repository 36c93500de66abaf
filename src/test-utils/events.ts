import { ActionEvent, WebhookEvent, actionEventSchema, webhookEventSchema } from '../types/event.types';

export const ACCOUNT_ID = '6f0c2a4e-1111-4a6b-9c1d-000000000001';
export const WORKSPACE_ID = '6f0c2a4e-2222-4a6b-9c1d-000000000002';
export const OTHER_WORKSPACE_ID = '6f0c2a4e-3333-4a6b-9c1d-000000000003';

export function webhookPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    type: 'file.ready',
    account: { id: ACCOUNT_ID },
    workspace: { id: WORKSPACE_ID },
    project: { id: 'project-1' },
    user: { id: 'user-1' },
    resource: { id: 'file-1', type: 'file' },
    ...overrides,
  };
}

export function actionPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    type: 'my_app.transcribe',
    account_id: ACCOUNT_ID,
    action_id: 'action-1',
    interaction_id: 'interaction-1',
    workspace: { id: WORKSPACE_ID },
    project: { id: 'project-1' },
    user: { id: 'user-1' },
    resources: [{ id: 'file-1', type: 'file' }],
    ...overrides,
  };
}

export function webhookEvent(overrides: Record<string, unknown> = {}): WebhookEvent {
  return webhookEventSchema.parse({ timestamp: 1_700_000_000, ...webhookPayload(overrides) });
}

export function actionEvent(overrides: Record<string, unknown> = {}): ActionEvent {
  return actionEventSchema.parse({ timestamp: 1_700_000_000, ...actionPayload(overrides) });
}
