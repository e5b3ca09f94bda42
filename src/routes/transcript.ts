import { Router } from 'express';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HttpError, sendError } from '../errors.js';
import type { TranscriptFetcher } from '../services/transcript.js';
import { isSummaryFormat, summarizeTranscript } from '../services/summarize.js';
import { bodyString, requireVideoId } from './body.js';

/**
 * POST /transcript  { url } -> { videoId, source, transcript }
 * POST /summarize   { url, format? } -> { videoId, source, summary }
 */
export function transcriptRoutes(transcripts: TranscriptFetcher, llm: BaseChatModel, nodeEnv: string) {
    const router = Router();

    router.post('/transcript', async (req, res) => {
        try {
            const videoId = requireVideoId(bodyString(req, 'url'));
            const { text, source } = await transcripts.getTranscript(videoId);
            res.json({ videoId, source, transcript: text });
        } catch (error) {
            sendError(res, error, 'POST /transcript', nodeEnv);
        }
    });

    router.post('/summarize', async (req, res) => {
        try {
            const videoId = requireVideoId(bodyString(req, 'url'));
            const format = bodyString(req, 'format') || 'text';
            if (!isSummaryFormat(format)) {
                throw new HttpError('format must be "text" or "points"', 400);
            }

            const { text, source } = await transcripts.getTranscript(videoId);
            const summary = await summarizeTranscript(llm, text, { format });
            res.json({ videoId, source, summary });
        } catch (error) {
            sendError(res, error, 'POST /summarize', nodeEnv);
        }
    });

    return router;
}
