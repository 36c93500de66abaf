import { z } from 'zod';

export const webhookRecordSchema = z.object({
  webhookId: z.string().min(1),
  secret: z.string(),
  events: z.array(z.string()),
  url: z.string(),
});

export type WebhookRecord = z.infer<typeof webhookRecordSchema>;

export const actionRecordSchema = z.object({
  actionId: z.string().min(1),
  secret: z.string(),
  eventType: z.string().min(1),
  name: z.string(),
  description: z.string(),
  url: z.string(),
});

export type ActionRecord = z.infer<typeof actionRecordSchema>;

export const INSTALLATION_STATUSES = ['active', 'uninstalled'] as const;

export type InstallationStatus = (typeof INSTALLATION_STATUSES)[number];

/**
 * A tenant's registered footprint. Persisted as `install:<workspace_id>` with
 * every secret individually encrypted.
 */
export const installationSchema = z.object({
  accountId: z.string().min(1),
  workspaceId: z.string().min(1),
  installedAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  installedByUserId: z.string(),
  status: z.enum(INSTALLATION_STATUSES).default('active'),
  webhook: webhookRecordSchema.nullable(),
  actions: z.array(actionRecordSchema),
});

export type Installation = z.infer<typeof installationSchema>;

export interface ActionManifestEntry {
  eventType: string;
  name: string;
  description: string;
}

/**
 * What the running process declares: webhook event types and actions.
 * Derived from the handler registry, never persisted.
 */
export interface HandlerManifest {
  webhookEvents: string[];
  actions: ActionManifestEntry[];
}

export interface InstallationDiff {
  webhookEventsAdded: string[];
  webhookEventsRemoved: string[];
  actionsAdded: ActionManifestEntry[];
  actionsRemoved: ActionRecord[];
  actionsModified: ActionManifestEntry[];
  hasChanges: boolean;
}

export type WorkspaceInstallStatus = 'not_installed' | 'installed' | 'update_available';

/** Look of the install pages. Unset fields use the defaults. */
export interface InstallBranding {
  /** http(s) URL of an image shown above the app name. */
  logoUrl?: string;
  /** Hex colour for buttons. */
  primaryColor?: string;
  /** Hex colour for the header rule and links. */
  accentColor?: string;
  /** Appended after the built-in styles. */
  customCss?: string;
  showPoweredBy?: boolean;
}
