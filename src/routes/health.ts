import { Router } from 'express';
import type { SessionStore } from '../services/sessions.js';

export function healthRoute(sessions: SessionStore) {
    const router = Router();

    router.get('/', (_req, res) => {
        res.json({ status: 'ok', sessions: sessions.size });
    });

    return router;
}
