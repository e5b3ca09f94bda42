import { Router } from 'express';
import { HttpError, sendError } from '../errors.js';
import type { ChatService } from '../services/chat.js';
import { bodyString, checkSessionId, requireVideoId } from './body.js';

/**
 * POST /chat  { videoUrl, question, sessionId? }
 *
 * One-shot entry point: reuses the session when it is still live, otherwise
 * indexes the video (under the given sessionId, if any) and then answers.
 */
export function chatRoute(chat: ChatService, nodeEnv: string) {
    const router = Router();

    router.post('/', async (req, res) => {
        try {
            const videoUrl = bodyString(req, 'videoUrl');
            const question = bodyString(req, 'question');
            const sessionId = bodyString(req, 'sessionId');

            if (!videoUrl || !question) {
                throw new HttpError('Missing required fields: videoUrl and question are required', 400);
            }
            if (sessionId) {
                checkSessionId(sessionId);
            }

            const videoId = requireVideoId(videoUrl, 'videoUrl');
            const existing = sessionId ? chat.sessions.get(sessionId) : undefined;
            const reuse = existing !== undefined && existing.videoId === videoId;

            console.log('[chat] Video ID:', videoId, '| Session ID:', sessionId || '(new)', '| Reuse:', reuse);

            const session = reuse ? existing : await chat.createSession(videoId, sessionId || undefined);
            const { answer, sources } = await chat.ask(session.id, question);

            res.json({ answer, sessionId: session.id, isNewSession: !reuse, sources });
        } catch (error) {
            sendError(res, error, 'POST /chat', nodeEnv);
        }
    });

    return router;
}
