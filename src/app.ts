import express from 'express';
import cors from 'cors';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { AppConfig } from './config.js';
import type { ChatService } from './services/chat.js';
import type { TranscriptFetcher } from './services/transcript.js';
import { chatRoute } from './routes/chat.js';
import { healthRoute } from './routes/health.js';
import { sessionRoutes } from './routes/sessions.js';
import { transcriptRoutes } from './routes/transcript.js';

export interface AppDeps {
    config: Pick<AppConfig, 'nodeEnv' | 'corsOrigins'>;
    transcripts: TranscriptFetcher;
    chat: ChatService;
    llm: BaseChatModel;
}

export function createApp({ config, transcripts, chat, llm }: AppDeps) {
    const app = express();

    app.use(cors({
        origin: config.corsOrigins,
        credentials: true,
        methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
    }));
    app.use(express.json({ limit: '1mb' }));

    app.use('/health', healthRoute(chat.sessions));
    app.use('/', transcriptRoutes(transcripts, llm, config.nodeEnv));
    app.use('/sessions', sessionRoutes(chat, config.nodeEnv));
    app.use('/chat', chatRoute(chat, config.nodeEnv));

    return app;
}
