import { ChatPromptTemplate, MessagesPlaceholder } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { RunnableSequence } from '@langchain/core/runnables';
import { AIMessage, HumanMessage } from '@langchain/core/messages';
import { Document, type DocumentInterface } from '@langchain/core/documents';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HttpError } from '../errors.js';
import { splitTranscript, type ChunkOptions } from './chunker.js';
import { SessionStore, type ChatSession } from './sessions.js';
import type { TranscriptFetcher } from './transcript.js';
import { InnerProductVectorStore } from './vectorStore.js';

export interface ChatOptions extends ChunkOptions {
    retrievalK: number;
    maxHistoryTurns: number;
}

export interface ChatServiceDeps {
    transcripts: TranscriptFetcher;
    embeddings: EmbeddingsInterface;
    llm: BaseChatModel;
    sessions: SessionStore;
    options: ChatOptions;
}

export interface ChatAnswer {
    answer: string;
    sources: number[];
}

const SYSTEM_PROMPT = `You are a helpful assistant. Answer ONLY from the provided transcript context and the conversation so far. If the context is insufficient, just say you don't know.`;

const promptTemplate = ChatPromptTemplate.fromMessages([
    ['system', SYSTEM_PROMPT],
    new MessagesPlaceholder('history'),
    ['human', 'Question: {question}\n\nContext:\n{context}'],
]);

export const formatDocs = (retrievedDocs: DocumentInterface[]) =>
    retrievedDocs.map(doc => doc.pageContent).join('\n\n');

const chunkIndexOf = (doc: DocumentInterface): number | undefined => {
    const value: unknown = doc.metadata.chunkIndex;
    return typeof value === 'number' ? value : undefined;
};

export class ChatService {
    constructor(private readonly deps: ChatServiceDeps) {}

    get sessions(): SessionStore {
        return this.deps.sessions;
    }

    /**
     * Fetches, chunks and indexes a video's transcript under a new session.
     * With `ifAbsent`, an id that is taken by the time indexing finishes
     * fails with a 409 instead of replacing that session.
     */
    async createSession(videoId: string, sessionId?: string, { ifAbsent = false } = {}): Promise<ChatSession> {
        const { transcripts, embeddings, options, sessions } = this.deps;
        const transcript = await transcripts.getTranscript(videoId);

        const chunks = await splitTranscript(transcript.text, options);
        if (!chunks.length) {
            throw new HttpError('Transcript is empty after processing. Try another video.', 422);
        }

        const store = new InnerProductVectorStore(embeddings);
        await store.addDocuments(chunks.map((pageContent, chunkIndex) => new Document({
            pageContent,
            metadata: { source: 'youtube', chunkIndex, videoId },
        })));

        if (ifAbsent && sessionId && sessions.has(sessionId)) {
            throw new HttpError(`Session already exists: ${sessionId}`, 409);
        }

        const session = sessions.add({ videoId, source: transcript.source, store, chunkCount: chunks.length }, sessionId);
        console.log(`[chat] Session ${session.id}: indexed ${chunks.length} chunks of ${videoId} (${transcript.source})`);
        return session;
    }

    /**
     * Answers one question from the session's transcript. The exchange is
     * appended to the session history, which keeps the latest
     * `maxHistoryTurns` question/answer pairs.
     */
    async ask(sessionId: string, question: string): Promise<ChatAnswer> {
        const session = this.deps.sessions.touch(sessionId);
        if (!session) {
            throw new HttpError(`Session not found: ${sessionId}`, 404);
        }

        const retriever = session.store.asRetriever(this.deps.options.retrievalK);
        const retrieved = await retriever.invoke(question);

        const chain = RunnableSequence.from([promptTemplate, this.deps.llm, new StringOutputParser()]);
        const answer = await chain.invoke({
            question,
            context: formatDocs(retrieved),
            history: session.history,
        });

        const maxMessages = this.deps.options.maxHistoryTurns * 2;
        const history = [...session.history, new HumanMessage(question), new AIMessage(answer)];
        session.history = maxMessages > 0 ? history.slice(-maxMessages) : [];

        return {
            answer,
            sources: retrieved.map(chunkIndexOf).filter((index): index is number => index !== undefined),
        };
    }
}
