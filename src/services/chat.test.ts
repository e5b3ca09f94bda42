import { describe, expect, it, vi, beforeEach } from 'vitest';
import { AIMessage, HumanMessage, SystemMessage } from '@langchain/core/messages';
import { KeywordEmbeddings, RecordingChatModel, StaticTranscripts } from '../test/fakes.js';
import { ChatService, formatDocs } from './chat.js';
import { SessionStore } from './sessions.js';

const words = (prefix: string) => [1, 2, 3].map(n => `${prefix}000${n}`).join(' ');
const VIDEO_ID = 'abcDEF12345';

function setup(replies: string[], texts: Record<string, string> = { [VIDEO_ID]: `${words('apple')} ${words('berry')} ${words('melon')}` }) {
    const llm = new RecordingChatModel(replies);
    const transcripts = new StaticTranscripts(texts);
    const chat = new ChatService({
        transcripts,
        embeddings: new KeywordEmbeddings(['apple', 'berry', 'melon']),
        llm,
        sessions: new SessionStore(10),
        options: { chunkSize: 29, chunkOverlap: 0, retrievalK: 2, maxHistoryTurns: 1 },
    });
    return { chat, llm, transcripts };
}

describe('ChatService', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    it('indexes the transcript into a new session', async () => {
        const { chat, transcripts } = setup([]);

        const session = await chat.createSession(VIDEO_ID, 'chat-1');

        expect(transcripts.requested).toEqual([VIDEO_ID]);
        expect(session).toMatchObject({ id: 'chat-1', videoId: VIDEO_ID, source: 'captions', chunkCount: 3 });
        expect(session.store.size).toBe(3);
        expect(chat.sessions.get('chat-1')).toBe(session);
    });

    it('answers from the closest chunks and reports them as sources', async () => {
        const { chat, llm } = setup(['Berries are covered.']);
        await chat.createSession(VIDEO_ID, 'chat-1');

        const result = await chat.ask('chat-1', 'what about berry?');

        expect(result).toEqual({ answer: 'Berries are covered.', sources: [1, 0] });
        const [messages] = llm.calls;
        expect(messages).toHaveLength(2);
        expect(messages?.[0]).toBeInstanceOf(SystemMessage);
        expect(messages?.[1]?.content).toBe(
            'Question: what about berry?\n\nContext:\nberry0001 berry0002 berry0003\n\napple0001 apple0002 apple0003',
        );
    });

    it('sends prior turns and keeps only the latest ones', async () => {
        const { chat, llm } = setup(['first answer', 'second answer', 'third answer']);
        await chat.createSession(VIDEO_ID, 'chat-1');

        await chat.ask('chat-1', 'what about berry?');
        const second = await chat.ask('chat-1', 'and melon?');
        await chat.ask('chat-1', 'and apple?');

        expect(second.sources).toEqual([2, 0]);

        const secondPrompt = llm.calls[1] ?? [];
        expect(secondPrompt.map(message => message.content).slice(1, 3)).toEqual(['what about berry?', 'first answer']);
        expect(secondPrompt[1]).toBeInstanceOf(HumanMessage);
        expect(secondPrompt[2]).toBeInstanceOf(AIMessage);

        const thirdPrompt = llm.calls[2] ?? [];
        expect(thirdPrompt).toHaveLength(4);
        expect(thirdPrompt.map(message => message.content).slice(1, 3)).toEqual(['and melon?', 'second answer']);

        const history = chat.sessions.get('chat-1')?.history ?? [];
        expect(history.map(message => message.content)).toEqual(['and apple?', 'third answer']);
    });

    it('evicts the least recently used session once the store is full', async () => {
        const llm = new RecordingChatModel(['reply']);
        const chat = new ChatService({
            transcripts: new StaticTranscripts({ [VIDEO_ID]: words('apple') }),
            embeddings: new KeywordEmbeddings(['apple']),
            llm,
            sessions: new SessionStore(2),
            options: { chunkSize: 29, chunkOverlap: 0, retrievalK: 1, maxHistoryTurns: 1 },
        });

        await chat.createSession(VIDEO_ID, 'first');
        await chat.createSession(VIDEO_ID, 'second');
        await chat.ask('first', 'apple?');
        await chat.createSession(VIDEO_ID, 'third');

        expect(chat.sessions.size).toBe(2);
        expect(chat.sessions.has('first')).toBe(true);
        expect(chat.sessions.has('second')).toBe(false);
        await expect(chat.ask('second', 'apple?')).rejects.toMatchObject({ statusCode: 404 });
    });

    it('replaces a session with the same id by default', async () => {
        const { chat } = setup([]);

        const first = await chat.createSession(VIDEO_ID, 'chat-1');
        const second = await chat.createSession(VIDEO_ID, 'chat-1');

        expect(second).not.toBe(first);
        expect(chat.sessions.get('chat-1')).toBe(second);
    });

    it('lets only one of two concurrent creations claim an id when ifAbsent is set', async () => {
        const { chat } = setup([]);

        const results = await Promise.allSettled([
            chat.createSession(VIDEO_ID, 'shared', { ifAbsent: true }),
            chat.createSession(VIDEO_ID, 'shared', { ifAbsent: true }),
        ]);

        const fulfilled = results.flatMap(result => (result.status === 'fulfilled' ? [result.value] : []));
        const rejected = results.flatMap(result => (result.status === 'rejected' ? [result.reason] : []));
        expect(fulfilled).toHaveLength(1);
        expect(chat.sessions.get('shared')).toBe(fulfilled[0]);
        expect(rejected).toEqual([expect.objectContaining({ statusCode: 409, message: 'Session already exists: shared' })]);
    });

    it('throws a 404 for an unknown session', async () => {
        const { chat } = setup([]);

        await expect(chat.ask('missing', 'hello?')).rejects.toMatchObject({
            statusCode: 404,
            message: 'Session not found: missing',
        });
    });

    it('refuses to index a transcript with no usable text', async () => {
        const { chat } = setup([], { [VIDEO_ID]: '   ' });

        await expect(chat.createSession(VIDEO_ID)).rejects.toMatchObject({ statusCode: 422 });
        expect(chat.sessions.size).toBe(0);
    });
});

describe('formatDocs', () => {
    it('joins page contents with blank lines', () => {
        expect(formatDocs([
            { pageContent: 'one', metadata: {} },
            { pageContent: 'two', metadata: {} },
        ])).toBe('one\n\ntwo');
    });
});
