import { AnyEvent } from '../../types/event.types';
import { ContextError } from '../../utils/errors';

/**
 * Per-request values handed to every middleware and handler alongside the
 * event.
 */
export interface HandlerContext {
  readonly event: AnyEvent;
  /** Public base URL the request arrived on. */
  readonly baseUrl: string;
  /** Signed-in user's access token; only for actions with `requireUserAuth`. */
  getUserToken(): string;
  readonly hasUserToken: boolean;
  /** Scratch space shared between middleware and the handler. */
  readonly state: Map<string, unknown>;
}

export function createHandlerContext(event: AnyEvent, baseUrl: string, userToken: string | null): HandlerContext {
  return {
    event,
    baseUrl,
    state: new Map(),
    hasUserToken: userToken !== null,
    getUserToken() {
      if (userToken === null) {
        throw new ContextError(
          `No user token for '${event.type}': register the action with requireUserAuth to receive one`
        );
      }
      return userToken;
    },
  };
}
