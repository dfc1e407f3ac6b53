import { describe, it, expect } from 'vitest';
import { SessionStore, generateId } from '../sessionStore.js';
import { withProfile } from '../../../src/api/session.js';

describe('SessionStore', () => {
  it('keeps the latest saved value per id', () => {
    const store = new SessionStore();
    const session = store.create();

    store.save(withProfile(session, 'professional'));
    expect(store.get(session.id)?.profileType).toBe('professional');
    expect(store.size).toBe(1);
  });

  it('forgets deleted sessions', () => {
    const store = new SessionStore();
    const { id } = store.create();

    expect(store.delete(id)).toBe(true);
    expect(store.get(id)).toBeUndefined();
    expect(store.delete(id)).toBe(false);
  });
});

describe('generateId', () => {
  it('produces cuid-like ids', () => {
    expect(generateId()).toMatch(/^c[0-9a-z]+$/);
  });
});
