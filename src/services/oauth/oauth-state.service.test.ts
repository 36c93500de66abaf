import { describe, it, expect } from 'vitest';
import { MemoryStorage } from '../../repositories/memory.storage';
import { OAUTH_STATE_TTL_SECONDS, OAuthStateService } from './oauth-state.service';

const createdAt = new Date('2026-02-02T10:00:00.000Z');

describe('OAuthStateService', () => {
  it('creates a state that can be consumed exactly once', async () => {
    const service = new OAuthStateService(new MemoryStorage(), () => createdAt);
    const token = await service.create({
      flow: 'user_auth',
      user_id: 'user-1',
      interaction_id: 'interaction-1',
      redirect_uri: 'https://app.example.test/auth/callback',
    });

    expect(await service.consume(token)).toEqual({
      flow: 'user_auth',
      user_id: 'user-1',
      interaction_id: 'interaction-1',
      redirect_uri: 'https://app.example.test/auth/callback',
      created_at: '2026-02-02T10:00:00.000Z',
    });
    expect(await service.consume(token)).toBeNull();
  });

  it('generates distinct tokens', async () => {
    const service = new OAuthStateService(new MemoryStorage());
    const state = {
      flow: 'installation' as const,
      user_id: null,
      interaction_id: null,
      redirect_uri: 'https://app.example.test/install/callback',
    };
    expect(await service.create(state)).not.toBe(await service.create(state));
  });

  it('expires states after ten minutes', async () => {
    let clock = 0;
    const service = new OAuthStateService(new MemoryStorage(() => clock));
    const token = await service.create({
      flow: 'installation',
      user_id: null,
      interaction_id: null,
      redirect_uri: 'https://app.example.test/install/callback',
    });

    clock = OAUTH_STATE_TTL_SECONDS * 1000;
    expect(await service.consume(token)).toBeNull();
  });

  it('discards and deletes a malformed record', async () => {
    const storage = new MemoryStorage();
    await storage.put(OAuthStateService.key('bad'), { flow: 'something-else' });
    const service = new OAuthStateService(storage);

    expect(await service.consume('bad')).toBeNull();
    expect(await storage.get(OAuthStateService.key('bad'))).toBeNull();
  });
});
