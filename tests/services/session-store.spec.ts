import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SessionStore } from '../../src/services/session-store.js';
import type { SessionRecord } from '../../src/types/session.js';

function record(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    sessionId: 'session-a',
    title: 'Garden planning',
    messages: [
      { role: 'user', content: 'How big should the beds be?' },
      { role: 'assistant', content: 'Four by eight feet.' },
    ],
    summaryXml: null,
    summarizedUpTo: 0,
    waypoints: [{ messageIndex: 1, createdAt: '2026-02-01T10:00:00.000Z' }],
    tokenCount: 42,
    modelsUsed: ['claude-sonnet-4-5-20250514'],
    createdAt: '2026-02-01T09:00:00.000Z',
    updatedAt: '2026-02-01T10:00:00.000Z',
    ...overrides,
  };
}

describe('SessionStore', () => {
  let store: SessionStore;

  beforeEach(() => {
    store = new SessionStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('saves and loads a full session', () => {
    store.saveSession(record());
    expect(store.loadSession('session-a')).toEqual(record());
  });

  it('returns null for an unknown session', () => {
    expect(store.loadSession('missing')).toBeNull();
  });

  it('replaces messages and waypoints on re-save', () => {
    store.saveSession(record());
    const updated = record({
      messages: [{ role: 'user', content: 'Only this now' }],
      waypoints: [],
      summaryXml: '<ContextSummary/>',
      summarizedUpTo: 1,
      updatedAt: '2026-02-01T11:00:00.000Z',
    });
    store.saveSession(updated);
    expect(store.loadSession('session-a')).toEqual(updated);
  });

  it('lists sessions newest first with message counts', () => {
    store.saveSession(record());
    store.saveSession(record({ sessionId: 'session-b', title: 'Later', messages: [], updatedAt: '2026-02-02T00:00:00.000Z' }));

    expect(store.listSessions()).toEqual([
      { sessionId: 'session-b', title: 'Later', messageCount: 0, updatedAt: '2026-02-02T00:00:00.000Z' },
      { sessionId: 'session-a', title: 'Garden planning', messageCount: 2, updatedAt: '2026-02-01T10:00:00.000Z' },
    ]);
    expect(store.listSessions(1)).toHaveLength(1);
  });

  it('deletes a session with its children', () => {
    store.saveSession(record());
    expect(store.deleteSession('session-a')).toBe(true);
    expect(store.deleteSession('session-a')).toBe(false);
    expect(store.loadSession('session-a')).toBeNull();
  });
});
