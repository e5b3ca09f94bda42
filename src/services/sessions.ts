import { randomUUID } from 'crypto';
import type { BaseMessage } from '@langchain/core/messages';
import type { TranscriptSource } from '../config.js';
import type { InnerProductVectorStore } from './vectorStore.js';

export const SESSION_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

export interface ChatSession {
    id: string;
    videoId: string;
    source: TranscriptSource;
    store: InnerProductVectorStore;
    chunkCount: number;
    history: BaseMessage[];
    createdAt: Date;
    lastUsedAt: Date;
}

export type NewSession = Omit<ChatSession, 'id' | 'history' | 'createdAt' | 'lastUsedAt'>;

export const newSessionId = () => randomUUID();

/**
 * All live chat sessions, held in process. Once `maxSessions` is reached the
 * least recently used session makes room for a new one.
 */
export class SessionStore {
    // Map iteration order doubles as recency order: oldest first.
    private readonly sessions = new Map<string, ChatSession>();

    constructor(private readonly maxSessions: number, private readonly now: () => Date = () => new Date()) {}

    get size(): number {
        return this.sessions.size;
    }

    has(id: string): boolean {
        return this.sessions.has(id);
    }

    get(id: string): ChatSession | undefined {
        return this.sessions.get(id);
    }

    /** Looks a session up and marks it as most recently used. */
    touch(id: string): ChatSession | undefined {
        const session = this.sessions.get(id);
        if (session) {
            session.lastUsedAt = this.now();
            this.sessions.delete(id);
            this.sessions.set(id, session);
        }
        return session;
    }

    add(fields: NewSession, id: string = newSessionId()): ChatSession {
        if (!SESSION_ID_PATTERN.test(id)) {
            throw new Error(`Invalid session id "${id}"`);
        }

        this.sessions.delete(id);
        while (this.maxSessions > 0 && this.sessions.size >= this.maxSessions) {
            const oldest = this.sessions.keys().next();
            if (oldest.done) break;
            console.log(`[sessions] Evicting least recently used session ${oldest.value}`);
            this.sessions.delete(oldest.value);
        }

        const createdAt = this.now();
        const session: ChatSession = { ...fields, id, history: [], createdAt, lastUsedAt: createdAt };
        this.sessions.set(id, session);
        return session;
    }

    delete(id: string): boolean {
        return this.sessions.delete(id);
    }
}
