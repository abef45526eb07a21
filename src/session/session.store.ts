import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Inject, Injectable } from '@nestjs/common';
import type { Cache } from 'cache-manager';

import { SessionState } from './interfaces';
import { INITIAL_SESSION_STATE } from './session.machine';

const SESSION_KEY_PREFIX = 'session:';

/**
 * Per-session state kept in the cache; entries expire with the cache TTL.
 */
@Injectable()
export class SessionStore {
  constructor(@Inject(CACHE_MANAGER) private readonly cache: Cache) {}

  public async load(sessionId: string): Promise<SessionState> {
    const state = await this.cache.get<SessionState>(this.key(sessionId));
    return state ?? INITIAL_SESSION_STATE;
  }

  public async save(sessionId: string, state: SessionState): Promise<void> {
    await this.cache.set(this.key(sessionId), state);
  }

  public async clear(sessionId: string): Promise<void> {
    await this.cache.del(this.key(sessionId));
  }

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}${sessionId}`;
  }
}
