import { describe, it, expect } from 'vitest';
import { actionEvent } from '../../test-utils/events';
import { ContextError } from '../../utils/errors';
import { createHandlerContext } from './handler-context';

describe('createHandlerContext', () => {
  it('exposes the user token when one was resolved', () => {
    const ctx = createHandlerContext(actionEvent(), 'https://app.example.test', 'user-token');

    expect(ctx.hasUserToken).toBe(true);
    expect(ctx.getUserToken()).toBe('user-token');
  });

  it('throws when the action did not ask for user auth', () => {
    const ctx = createHandlerContext(actionEvent(), 'https://app.example.test', null);

    expect(ctx.hasUserToken).toBe(false);
    expect(() => ctx.getUserToken()).toThrow(ContextError);
    expect(() => ctx.getUserToken()).toThrow(
      "No user token for 'my_app.transcribe': register the action with requireUserAuth to receive one"
    );
  });

  it('starts each request with empty state', () => {
    const first = createHandlerContext(actionEvent(), 'https://app.example.test', null);
    first.state.set('key', 'value');
    const second = createHandlerContext(actionEvent(), 'https://app.example.test', null);

    expect(second.state.size).toBe(0);
  });
});
