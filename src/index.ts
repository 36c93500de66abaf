export { createApp } from './app';
export {
  EventApp,
  type EventAppOptions,
  type OAuthOptions,
  type InstallOptions,
  type WebhookHandler,
  type ActionHandler,
  type Middleware,
  type HandlerResult,
  type WebhookOptions,
  type ActionOptions,
} from './services/dispatch/event-app';
export { EventDispatcher } from './services/dispatch/event-dispatcher.service';
export { type HandlerContext } from './services/dispatch/handler-context';
export { openTelemetryMiddleware, type OpenTelemetryOptions } from './services/dispatch/otel.middleware';
export {
  SecretResolutionStrategy,
  type SecretResolver,
  type SecretValue,
} from './services/secrets/secret-resolution.service';
export { OAuthClient } from './services/oauth/oauth-client.service';
export { TokenManager } from './services/oauth/token-manager.service';
export { InstallationManager } from './services/install/installation-manager.service';
export { InstallationSecretResolver } from './services/install/installation-secret-resolver.service';
export { computeDiff, buildManifest } from './services/install/installation-diff';
export {
  FrameioApiClient,
  type PlatformApi,
  type PlatformApiFactory,
} from './services/platform/frameio-api.service';
export { MemoryStorage } from './repositories/memory.storage';
export { RedisStorage } from './repositories/redis.storage';
export { type Storage, type StoredValue } from './repositories/storage';
export { TokenEncryption, type KeyringProvider } from './utils/encryption.util';
export { verifySignature, signPayload } from './utils/signature.util';
export { message, form, type Message, type Form, type FormField, type ActionResponse } from './types/response.types';
export { type WebhookEvent, type ActionEvent, type AnyEvent, type Resource, type ResourceType } from './types/event.types';
export { type TokenData } from './types/oauth.types';
export { type Installation, type HandlerManifest, type InstallationDiff, type InstallBranding } from './types/installation.types';
export * from './utils/errors';
