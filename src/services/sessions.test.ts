import { describe, expect, it, vi } from 'vitest';
import { KeywordEmbeddings } from '../test/fakes.js';
import { SessionStore, newSessionId, type NewSession } from './sessions.js';
import { InnerProductVectorStore } from './vectorStore.js';

const fields = (videoId: string): NewSession => ({
    videoId,
    source: 'captions',
    store: new InnerProductVectorStore(new KeywordEmbeddings([])),
    chunkCount: 1,
});

describe('SessionStore', () => {
    it('stores sessions under a generated UUID by default', () => {
        const store = new SessionStore(10);

        const session = store.add(fields('abcDEF12345'));

        expect(session.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
        expect(store.get(session.id)).toBe(session);
        expect(session.history).toEqual([]);
        expect(store.size).toBe(1);
    });

    it('rejects malformed session ids', () => {
        expect(() => new SessionStore(10).add(fields('abcDEF12345'), 'not valid!')).toThrow('Invalid session id "not valid!"');
    });

    it('replaces a session added again under the same id', () => {
        const store = new SessionStore(10);
        store.add(fields('abcDEF12345'), 'chat-1');

        const replacement = store.add(fields('zyxWVU98765'), 'chat-1');

        expect(store.size).toBe(1);
        expect(store.get('chat-1')).toBe(replacement);
    });

    it('evicts the least recently used session once full', () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const store = new SessionStore(2);
        store.add(fields('aaaaaaaaaaa'), 'first');
        store.add(fields('bbbbbbbbbbb'), 'second');
        store.touch('first');

        store.add(fields('ccccccccccc'), 'third');

        expect(store.has('first')).toBe(true);
        expect(store.has('second')).toBe(false);
        expect(store.has('third')).toBe(true);
    });

    it('never evicts when the cap is zero', () => {
        const store = new SessionStore(0);
        for (let i = 0; i < 5; i++) {
            store.add(fields('abcDEF12345'), `s${i}`);
        }

        expect(store.size).toBe(5);
    });

    it('updates lastUsedAt on touch', () => {
        const times = [new Date('2026-01-01T00:00:00Z'), new Date('2026-01-01T00:05:00Z')];
        const store = new SessionStore(10, () => times.shift() ?? new Date(0));
        store.add(fields('abcDEF12345'), 'chat-1');

        const touched = store.touch('chat-1');

        expect(touched?.createdAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
        expect(touched?.lastUsedAt.toISOString()).toBe('2026-01-01T00:05:00.000Z');
        expect(store.touch('missing')).toBeUndefined();
    });

    it('deletes sessions', () => {
        const store = new SessionStore(10);
        store.add(fields('abcDEF12345'), 'chat-1');

        expect(store.delete('chat-1')).toBe(true);
        expect(store.delete('chat-1')).toBe(false);
    });
});

it('generates distinct session ids', () => {
    expect(newSessionId()).not.toBe(newSessionId());
});
