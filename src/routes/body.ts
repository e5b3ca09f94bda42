import type { Request } from 'express';
import { HttpError } from '../errors.js';
import { extractVideoId } from '../utils/videoId.js';
import { SESSION_ID_PATTERN } from '../services/sessions.js';

export function bodyString(req: Request, key: string): string {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || !(key in body)) {
        return '';
    }
    const value: unknown = Reflect.get(body, key);
    return typeof value === 'string' ? value.trim() : '';
}

export function requireVideoId(url: string, field = 'url'): string {
    if (!url) {
        throw new HttpError(`Missing required field: ${field}`, 400);
    }
    const videoId = extractVideoId(url);
    if (!videoId) {
        throw new HttpError('Invalid YouTube URL', 400);
    }
    return videoId;
}

export function checkSessionId(sessionId: string) {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
        throw new HttpError('Invalid sessionId format. Only alphanumeric, hyphen, and underscore are allowed.', 400);
    }
}
