import { MemoryStorage } from '../../repositories/memory.storage';
import { Storage } from '../../repositories/storage';
import { ActionEvent, AnyEvent, RESOURCE_TYPES, ResourceType, WebhookEvent } from '../../types/event.types';
import { HandlerManifest, InstallBranding } from '../../types/installation.types';
import { ActionResponse } from '../../types/response.types';
import { TokenEncryption } from '../../utils/encryption.util';
import { ConfigurationError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { buildManifest } from '../install/installation-diff';
import { InstallSessionService } from '../install/install-session.service';
import { InstallationManager } from '../install/installation-manager.service';
import { InstallationSecretResolver } from '../install/installation-secret-resolver.service';
import { DEFAULT_SCOPES, FetchLike, OAuthClient } from '../oauth/oauth-client.service';
import { OAuthStateService } from '../oauth/oauth-state.service';
import { TokenManager } from '../oauth/token-manager.service';
import { FrameioApiClient, PlatformApiFactory } from '../platform/frameio-api.service';
import {
  SecretResolutionStrategy,
  SecretResolver,
  SecretValue,
  resolveSecretAtRegistration,
} from '../secrets/secret-resolution.service';
import { PageChrome } from '../../views/layout';
import { HandlerContext } from './handler-context';

const logger = createLogger('event-app');

export const WEBHOOK_SECRET_ENV = 'WEBHOOK_SECRET';
export const CUSTOM_ACTION_SECRET_ENV = 'CUSTOM_ACTION_SECRET';

export type HandlerResult = ActionResponse | null | undefined | void;

export type WebhookHandler = (event: WebhookEvent, ctx: HandlerContext) => HandlerResult | Promise<HandlerResult>;
export type ActionHandler = (event: ActionEvent, ctx: HandlerContext) => HandlerResult | Promise<HandlerResult>;

/**
 * Runs around every handler. Call `next()` to continue the chain, or return
 * a response without calling it to short-circuit.
 */
export type Middleware = (
  event: AnyEvent,
  ctx: HandlerContext,
  next: () => Promise<HandlerResult>
) => Promise<HandlerResult>;

export interface WebhookOptions {
  secret?: string | ((event: WebhookEvent) => SecretValue | Promise<SecretValue>);
}

export interface ActionOptions {
  name?: string;
  description?: string;
  secret?: string | ((event: ActionEvent) => SecretValue | Promise<SecretValue>);
  /** Sign the user in with Adobe before the handler runs. */
  requireUserAuth?: boolean;
  /** Only run for resources of these types. */
  resourceType?: ResourceType | ResourceType[];
}

export interface WebhookRegistration {
  kind: 'webhook';
  eventType: string;
  handler: WebhookHandler;
  secrets: SecretResolutionStrategy<WebhookEvent>;
}

export interface ActionRegistration {
  kind: 'action';
  eventType: string;
  handler: ActionHandler;
  name: string;
  description: string;
  requireUserAuth: boolean;
  resourceTypes: ResourceType[] | null;
  secrets: SecretResolutionStrategy<ActionEvent>;
}

export type Registration = WebhookRegistration | ActionRegistration;

export interface OAuthOptions {
  clientId: string;
  clientSecret: string;
  /** Defaults to `<baseUrl>/auth/callback`. */
  redirectUri?: string;
  scopes?: string[];
  imsUrl?: string;
  tokenRefreshBufferSeconds?: number;
  fetch?: FetchLike;
}

export interface InstallOptions {
  appName: string;
  appDescription?: string;
  sessionSecret: string;
  sessionTtl?: number;
  platform?: PlatformApiFactory;
  apiBaseUrl?: string;
  secureCookie?: boolean;
  branding?: InstallBranding;
}

export interface EventAppOptions {
  /** Shown on the sign-in and install pages. */
  appName?: string;
  /** Public URL of this service; derived from each request when absent. */
  baseUrl?: string;
  storage?: Storage;
  encryption?: TokenEncryption;
  encryptionKey?: string;
  secretResolver?: SecretResolver;
  oauth?: OAuthOptions;
  install?: InstallOptions;
  env?: NodeJS.ProcessEnv;
}

function normalizeResourceTypes(value: ResourceType | ResourceType[] | undefined, eventType: string): ResourceType[] | null {
  if (value === undefined) return null;
  const types = Array.isArray(value) ? value : [value];
  if (types.length === 0) {
    throw new ConfigurationError(`Action '${eventType}' has an empty resourceType filter`);
  }
  const unknown = types.filter((type) => !RESOURCE_TYPES.some((known) => known === type));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Action '${eventType}' has unknown resource types: ${unknown.join(', ')}`);
  }
  return [...new Set(types)];
}

/**
 * Registry of webhook and custom action handlers, plus the services they
 * share: storage, encryption, OAuth and installation management.
 *
 * ```ts
 * const app = new EventApp({ oauth: { clientId, clientSecret } });
 * app.onWebhook('file.ready', async (event) => { ... });
 * app.onAction('my_app.transcribe', handler, { name: 'Transcribe', requireUserAuth: true });
 * ```
 */
export class EventApp {
  readonly appName: string;
  readonly baseUrl: string;
  readonly storage: Storage;
  readonly encryption: TokenEncryption;
  readonly secretResolver: SecretResolver | null;
  readonly oauthClient: OAuthClient | null = null;
  readonly oauthRedirectUri: string | null = null;
  readonly tokenManager: TokenManager | null = null;
  readonly oauthState: OAuthStateService;
  readonly installationManager: InstallationManager | null = null;
  readonly installSessions: InstallSessionService | null = null;
  readonly installOptions: InstallOptions | null;
  /** Name and branding for the HTML pages. */
  readonly pageChrome: PageChrome;
  readonly platform: PlatformApiFactory | null = null;

  private readonly registrations = new Map<string, Registration>();
  private readonly middlewares: Middleware[] = [];
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: EventAppOptions = {}) {
    this.env = options.env ?? process.env;
    this.baseUrl = (options.baseUrl || '').replace(/\/+$/, '');
    this.storage = options.storage ?? new MemoryStorage();
    this.encryption = options.encryption ?? new TokenEncryption({ key: options.encryptionKey, env: this.env });
    this.oauthState = new OAuthStateService(this.storage);
    this.installOptions = options.install ?? null;
    this.appName = options.appName || options.install?.appName || 'Frame.io App';
    this.pageChrome = { appName: this.appName, branding: options.install?.branding };

    const oauth = options.oauth;
    if (oauth) {
      this.oauthClient = new OAuthClient({
        clientId: oauth.clientId,
        clientSecret: oauth.clientSecret,
        scopes: oauth.scopes ?? DEFAULT_SCOPES,
        imsUrl: oauth.imsUrl,
        fetch: oauth.fetch,
      });
      this.oauthRedirectUri = oauth.redirectUri || null;
      this.tokenManager = new TokenManager({
        storage: this.storage,
        encryption: this.encryption,
        oauthClient: this.oauthClient,
        refreshBufferSeconds: oauth.tokenRefreshBufferSeconds,
      });
    }

    let resolver = options.secretResolver ?? null;
    const install = options.install;
    if (install) {
      this.platform = install.platform ?? FrameioApiClient.factory({ baseUrl: install.apiBaseUrl });
      this.installationManager = new InstallationManager({
        storage: this.storage,
        encryption: this.encryption,
        platform: this.platform,
        appName: install.appName,
      });
      this.installSessions = new InstallSessionService({
        storage: this.storage,
        encryption: this.encryption,
        secret: install.sessionSecret,
        ttlSeconds: install.sessionTtl ?? 1800,
        secureCookie: install.secureCookie,
      });
      if (!resolver) {
        resolver = new InstallationSecretResolver(this.installationManager);
        logger.info('Installation mode: signing secrets are resolved from installation records');
      }
    }
    this.secretResolver = resolver;
  }

  /**
   * Register a handler for one or more webhook event types.
   */
  onWebhook(eventTypes: string | string[], handler: WebhookHandler, options: WebhookOptions = {}): this {
    const types = Array.isArray(eventTypes) ? eventTypes : [eventTypes];
    if (types.length === 0) {
      throw new ConfigurationError('onWebhook needs at least one event type');
    }
    types.forEach((type) => this.assertUnregistered(type));

    const secret = resolveSecretAtRegistration<WebhookEvent>(
      options.secret,
      WEBHOOK_SECRET_ENV,
      `Webhook handler for '${types.join(', ')}'`,
      this.secretResolver !== null,
      this.env
    );
    const secrets = new SecretResolutionStrategy<WebhookEvent>({
      ...secret,
      appResolver: this.secretResolver ?? undefined,
    });

    for (const eventType of types) {
      this.registrations.set(eventType, { kind: 'webhook', eventType, handler, secrets });
    }
    logger.debug(`Registered webhook handler for ${types.join(', ')}`);
    return this;
  }

  /**
   * Register a custom action handler. Each action event type can be
   * registered once.
   */
  onAction(eventType: string, handler: ActionHandler, options: ActionOptions = {}): this {
    this.assertUnregistered(eventType);
    const resourceTypes = normalizeResourceTypes(options.resourceType, eventType);

    const secret = resolveSecretAtRegistration<ActionEvent>(
      options.secret,
      CUSTOM_ACTION_SECRET_ENV,
      `Action handler for '${eventType}'`,
      this.secretResolver !== null,
      this.env
    );

    this.registrations.set(eventType, {
      kind: 'action',
      eventType,
      handler,
      name: options.name || eventType,
      description: options.description ?? '',
      requireUserAuth: options.requireUserAuth ?? false,
      resourceTypes,
      secrets: new SecretResolutionStrategy<ActionEvent>({
        ...secret,
        appResolver: this.secretResolver ?? undefined,
      }),
    });
    logger.debug(`Registered action handler for ${eventType}`);
    return this;
  }

  /** Append a middleware; they run in registration order. */
  use(middleware: Middleware): this {
    this.middlewares.push(middleware);
    return this;
  }

  get middleware(): readonly Middleware[] {
    return this.middlewares;
  }

  getRegistration(eventType: string): Registration | undefined {
    return this.registrations.get(eventType);
  }

  get registeredTypes(): string[] {
    return [...this.registrations.keys()];
  }

  /** What this process declares, for comparison against installations. */
  get manifest(): HandlerManifest {
    const webhookTypes: string[] = [];
    const actions: HandlerManifest['actions'] = [];
    for (const registration of this.registrations.values()) {
      if (registration.kind === 'webhook') {
        webhookTypes.push(registration.eventType);
      } else {
        actions.push({
          eventType: registration.eventType,
          name: registration.name,
          description: registration.description,
        });
      }
    }
    return buildManifest(webhookTypes, actions);
  }

  /**
   * Problems that would stop a configured feature from working.
   * Empty when everything is consistent.
   */
  validateConfiguration(): string[] {
    const problems: string[] = [];

    for (const registration of this.registrations.values()) {
      if (registration.kind === 'action' && registration.requireUserAuth && !this.oauthClient) {
        problems.push(`Action '${registration.eventType}' requires user authentication but OAuth is not configured`);
      }
    }

    if (this.installOptions) {
      if (!this.oauthClient) {
        problems.push('Installation requires OAuth to be configured');
      }
      if (!this.installOptions.sessionSecret) {
        problems.push('Installation requires a session secret');
      }
      if (!this.installOptions.appName) {
        problems.push('Installation requires an app name');
      }
    }

    return problems;
  }

  /** Public base URL: the configured one, else the request's. */
  resolveBaseUrl(requestBaseUrl: string): string {
    return this.baseUrl || requestBaseUrl.replace(/\/+$/, '');
  }

  private assertUnregistered(eventType: string): void {
    if (!eventType) {
      throw new ConfigurationError('Event type must be a non-empty string');
    }
    const existing = this.registrations.get(eventType);
    if (existing) {
      throw new ConfigurationError(`A ${existing.kind} handler is already registered for '${eventType}'`);
    }
  }
}
