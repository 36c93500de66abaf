import { ActionEvent, AnyEvent, WebhookEvent } from '../../types/event.types';
import { ConfigurationError, SecretResolutionError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('secret-resolution');

export type SecretValue = string | null | undefined;

export type WebhookSecretResolver = (event: WebhookEvent) => SecretValue | Promise<SecretValue>;
export type ActionSecretResolver = (event: ActionEvent) => SecretValue | Promise<SecretValue>;

/**
 * App-level secret lookup, e.g. backed by a database or by installation records.
 */
export interface SecretResolver {
  getWebhookSecret(event: WebhookEvent): Promise<SecretValue>;
  getActionSecret(event: ActionEvent): Promise<SecretValue>;
}

export interface SecretSources<E extends AnyEvent> {
  staticSecret?: string;
  handlerResolver?: (event: E) => SecretValue | Promise<SecretValue>;
  appResolver?: SecretResolver;
}

interface ResolverStep<E extends AnyEvent> {
  source: string;
  run(event: E): SecretValue | Promise<SecretValue>;
}

function resolveFromApp(resolver: SecretResolver, event: AnyEvent): Promise<SecretValue> {
  return event.kind === 'webhook' ? resolver.getWebhookSecret(event) : resolver.getActionSecret(event);
}

/**
 * Decides which secret a request's signature is checked against.
 *
 * Sources are tried in order: static secret, handler resolver, app resolver.
 * The first configured source is authoritative: its errors and empty results
 * fail resolution rather than falling through, so a broken resolver can
 * never disable verification.
 */
export class SecretResolutionStrategy<E extends AnyEvent = AnyEvent> {
  private readonly steps: ResolverStep<E>[];

  constructor(sources: SecretSources<E>) {
    const { staticSecret, handlerResolver, appResolver } = sources;
    const steps: Array<ResolverStep<E> | null> = [
      staticSecret ? { source: 'Static secret', run: () => staticSecret } : null,
      handlerResolver ? { source: 'Handler resolver', run: handlerResolver } : null,
      appResolver ? { source: 'App resolver', run: (event: E) => resolveFromApp(appResolver, event) } : null,
    ];
    this.steps = steps.filter((step): step is ResolverStep<E> => step !== null);
  }

  get configured(): boolean {
    return this.steps.length > 0;
  }

  async resolve(event: E): Promise<string> {
    const [step] = this.steps;
    if (!step) {
      throw new SecretResolutionError(event.type, 'No secret source configured');
    }

    let secret: SecretValue;
    try {
      secret = await step.run(event);
    } catch (error) {
      if (error instanceof SecretResolutionError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`${step.source} failed for event '${event.type}': ${reason}`);
      throw new SecretResolutionError(event.type, `${step.source} failed: ${reason}`, { cause: error });
    }

    if (!secret) {
      throw new SecretResolutionError(event.type, `${step.source} returned empty value`);
    }
    return secret;
  }
}

export interface RegisteredSecret<E extends AnyEvent> {
  staticSecret?: string;
  handlerResolver?: (event: E) => SecretValue | Promise<SecretValue>;
}

/**
 * Settle a handler's secret configuration when it is registered.
 *
 * A non-empty string or a resolver function is used as given. Otherwise the
 * app resolver (if any) answers at request time, then the environment
 * variable is read once here.
 *
 * @throws ConfigurationError when no source is available at all.
 */
export function resolveSecretAtRegistration<E extends AnyEvent>(
  secret: string | ((event: E) => SecretValue | Promise<SecretValue>) | undefined,
  envVarName: string,
  handlerLabel: string,
  hasAppResolver: boolean,
  env: NodeJS.ProcessEnv = process.env
): RegisteredSecret<E> {
  if (typeof secret === 'function') {
    return { handlerResolver: secret };
  }
  if (secret) {
    return { staticSecret: secret };
  }
  if (hasAppResolver) {
    return {};
  }

  const fromEnv = env[envVarName];
  if (!fromEnv) {
    throw new ConfigurationError(
      `${handlerLabel} secret must be provided via the 'secret' option, an app-level secret resolver, ` +
        `or the ${envVarName} environment variable`
    );
  }
  return { staticSecret: fromEnv };
}
