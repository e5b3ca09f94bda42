import { Router } from 'express';
import { HttpError, sendError } from '../errors.js';
import type { ChatService } from '../services/chat.js';
import type { ChatSession } from '../services/sessions.js';
import { bodyString, checkSessionId, requireVideoId } from './body.js';

export const describeSession = (session: ChatSession) => ({
    sessionId: session.id,
    videoId: session.videoId,
    source: session.source,
    chunks: session.chunkCount,
    turns: session.history.length / 2,
    createdAt: session.createdAt.toISOString(),
    lastUsedAt: session.lastUsedAt.toISOString(),
});

export function sessionRoutes(chat: ChatService, nodeEnv: string) {
    const router = Router();

    router.post('/', async (req, res) => {
        try {
            const videoId = requireVideoId(bodyString(req, 'url'));
            const sessionId = bodyString(req, 'sessionId');
            if (sessionId) {
                checkSessionId(sessionId);
                if (chat.sessions.has(sessionId)) {
                    throw new HttpError(`Session already exists: ${sessionId}`, 409);
                }
            }

            const session = await chat.createSession(videoId, sessionId || undefined, { ifAbsent: true });
            res.status(201).json({
                sessionId: session.id,
                videoId: session.videoId,
                source: session.source,
                chunks: session.chunkCount,
            });
        } catch (error) {
            sendError(res, error, 'POST /sessions', nodeEnv);
        }
    });

    router.get('/:id', (req, res) => {
        try {
            checkSessionId(req.params.id);
            const session = chat.sessions.get(req.params.id);
            if (!session) {
                throw new HttpError(`Session not found: ${req.params.id}`, 404);
            }
            res.json(describeSession(session));
        } catch (error) {
            sendError(res, error, 'GET /sessions/:id', nodeEnv);
        }
    });

    router.delete('/:id', (req, res) => {
        try {
            checkSessionId(req.params.id);
            if (!chat.sessions.delete(req.params.id)) {
                throw new HttpError(`Session not found: ${req.params.id}`, 404);
            }
            res.status(204).end();
        } catch (error) {
            sendError(res, error, 'DELETE /sessions/:id', nodeEnv);
        }
    });

    router.post('/:id/messages', async (req, res) => {
        try {
            checkSessionId(req.params.id);
            const question = bodyString(req, 'question');
            if (!question) {
                throw new HttpError('Missing required field: question', 400);
            }

            res.json(await chat.ask(req.params.id, question));
        } catch (error) {
            sendError(res, error, 'POST /sessions/:id/messages', nodeEnv);
        }
    });

    return router;
}
