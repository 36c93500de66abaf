import { ActionEvent, AnyEvent } from '../../types/event.types';
import { ActionResponse, form, isActionResponse, message } from '../../types/response.types';
import { ConfigurationError, HandlerNotFoundError, TokenRefreshError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { HeaderBag } from '../../utils/signature.util';
import { ActionRegistration, EventApp, HandlerResult } from './event-app';
import { HandlerContext, createHandlerContext } from './handler-context';
import { assertSignature, parseActionEvent, parseEnvelope, parseWebhookEvent } from './request-parser';

const logger = createLogger('dispatcher');

export function loginUrl(baseUrl: string, event: ActionEvent): string {
  const params = new URLSearchParams({ user_id: event.userId, interaction_id: event.interactionId });
  return `${baseUrl}/auth/login?${params.toString()}`;
}

export function loginForm(baseUrl: string, event: ActionEvent): ActionResponse {
  return form('Authentication Required', 'Please click the link below to sign in with Adobe and continue.', [
    { type: 'link', label: 'Sign in with Adobe', name: 'login_url', value: loginUrl(baseUrl, event) },
  ]);
}

function resourceTypeMismatch(registration: ActionRegistration, event: ActionEvent): ActionResponse | null {
  const accepted = registration.resourceTypes;
  if (!accepted) return null;
  if (event.resources.every((resource) => accepted.includes(resource.type))) return null;
  return message('Action Not Available', `This action is only available for: ${accepted.join(', ')}.`);
}

/**
 * Runs one inbound request through parse, route, validate, verify and
 * handle. Failures surface as typed errors for the controller to map.
 */
export class EventDispatcher {
  constructor(private readonly app: EventApp) {}

  /**
   * @returns the action's response, or null when there is nothing to send
   * beyond a plain acknowledgement.
   */
  async dispatch(rawBody: Buffer, headers: HeaderBag, baseUrl: string): Promise<ActionResponse | null> {
    const { type, payload } = parseEnvelope(rawBody, headers);

    const registration = this.app.getRegistration(type);
    if (!registration) {
      throw new HandlerNotFoundError(type);
    }

    if (registration.kind === 'webhook') {
      const event = parseWebhookEvent(type, payload);
      const secret = await registration.secrets.resolve(event);
      assertSignature(headers, rawBody, secret);

      const ctx = createHandlerContext(event, baseUrl, null);
      await this.run(event, ctx, () => registration.handler(event, ctx));
      return null;
    }

    const event = parseActionEvent(type, payload);
    const secret = await registration.secrets.resolve(event);
    assertSignature(headers, rawBody, secret);

    const unavailable = resourceTypeMismatch(registration, event);
    if (unavailable) {
      logger.info(`Action ${type} skipped: resource type not accepted`);
      return unavailable;
    }

    let userToken: string | null = null;
    if (registration.requireUserAuth) {
      userToken = await this.userToken(event);
      if (userToken === null) {
        return loginForm(baseUrl, event);
      }
    }

    const ctx = createHandlerContext(event, baseUrl, userToken);
    const result = await this.run(event, ctx, () => registration.handler(event, ctx));
    return isActionResponse(result) ? result : null;
  }

  private async userToken(event: ActionEvent): Promise<string | null> {
    const tokens = this.app.tokenManager;
    if (!tokens) {
      throw new ConfigurationError(`Action '${event.type}' requires user authentication but OAuth is not configured`);
    }
    try {
      return await tokens.getAccessToken(event.userId);
    } catch (error) {
      if (error instanceof TokenRefreshError) {
        logger.info(`Token refresh failed for user ${event.userId}; asking them to sign in again`);
        return null;
      }
      throw error;
    }
  }

  private run(event: AnyEvent, ctx: HandlerContext, handler: () => HandlerResult | Promise<HandlerResult>) {
    const chain = this.app.middleware;
    const invoke = async (index: number): Promise<HandlerResult> => {
      const middleware = chain[index];
      if (!middleware) return handler();
      return middleware(event, ctx, () => invoke(index + 1));
    };
    return invoke(0);
  }
}
