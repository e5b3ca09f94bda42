import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';

export type TranscriptSource = 'captions' | 'whisper' | 'gemini';

const TRANSCRIPT_SOURCES: readonly TranscriptSource[] = ['captions', 'whisper', 'gemini'];

export interface AppConfig {
    port: number;
    nodeEnv: string;
    googleApiKey: string;
    groqApiKey: string;
    chatModel: string;
    embeddingModel: string;
    temperature: number;
    transcriptLanguages: string[];
    transcriptProviders: TranscriptSource[];
    maxTranscriptChars: number;
    whisperModel: string;
    whisperEndpoint: string;
    maxVideoLengthSec: number;
    maxAudioBytes: number;
    chunkSize: number;
    chunkOverlap: number;
    retrievalK: number;
    maxHistoryTurns: number;
    maxSessions: number;
    corsOrigins: (string | RegExp)[];
}

/**
 * Loads `.env` for the entry points. Looks beside `src/` first, then one
 * level higher for when the code runs from `dist/`.
 */
export function loadEnvFile() {
    const here = dirname(fileURLToPath(import.meta.url));
    const envPath1 = join(here, '../.env');
    const envPath2 = join(here, '../../.env');
    const envPath = existsSync(envPath1) ? envPath1 : envPath2;

    dotenv.config({ path: envPath });
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
        throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return value;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (Number.isNaN(value)) {
        throw new Error(`${name} must be a number, got "${raw}"`);
    }
    return value;
}

function readList(env: NodeJS.ProcessEnv, name: string, fallback: string[]): string[] {
    const raw = env[name];
    if (!raw) {
        return fallback;
    }
    const items = raw.split(',').map(item => item.trim()).filter(Boolean);
    return items.length ? items : fallback;
}

const isTranscriptSource = (value: string): value is TranscriptSource =>
    TRANSCRIPT_SOURCES.some(source => source === value);

function readProviders(env: NodeJS.ProcessEnv): TranscriptSource[] {
    const names = readList(env, 'TRANSCRIPT_PROVIDERS', [...TRANSCRIPT_SOURCES]);
    return names.map(name => {
        if (!isTranscriptSource(name)) {
            throw new Error(`Unknown transcript provider "${name}" (expected one of ${TRANSCRIPT_SOURCES.join(', ')})`);
        }
        return name;
    });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const chunkSize = readInt(env, 'CHUNK_SIZE', 1000);
    const chunkOverlap = readInt(env, 'CHUNK_OVERLAP', 200);
    if (chunkSize === 0 || chunkOverlap >= chunkSize) {
        throw new Error(`CHUNK_OVERLAP (${chunkOverlap}) must be smaller than a positive CHUNK_SIZE (${chunkSize})`);
    }

    return Object.freeze({
        port: readInt(env, 'PORT', 3005),
        nodeEnv: env.NODE_ENV || 'production',
        googleApiKey: env.GOOGLE_API_KEY || env.GEMINI_API_KEY || '',
        groqApiKey: env.GROQ_API_KEY || '',
        chatModel: env.CHAT_MODEL || 'gemini-2.5-flash',
        embeddingModel: env.EMBEDDING_MODEL || 'models/text-embedding-004',
        temperature: readNumber(env, 'TEMPERATURE', 0.7),
        transcriptLanguages: readList(env, 'TRANSCRIPT_LANGUAGES', ['en', 'hi']),
        transcriptProviders: readProviders(env),
        maxTranscriptChars: readInt(env, 'MAX_TRANSCRIPT_CHARS', 400_000),
        whisperModel: env.WHISPER_MODEL || 'whisper-large-v3',
        whisperEndpoint: env.WHISPER_ENDPOINT || 'https://api.groq.com/openai/v1/audio/transcriptions',
        maxVideoLengthSec: readInt(env, 'MAX_VIDEO_LENGTH_SEC', 7200),
        maxAudioBytes: readInt(env, 'MAX_AUDIO_BYTES', 1024 * 1024 * 1024),
        chunkSize,
        chunkOverlap,
        retrievalK: readInt(env, 'RETRIEVAL_K', 4),
        maxHistoryTurns: readInt(env, 'MAX_HISTORY_TURNS', 6),
        maxSessions: readInt(env, 'MAX_SESSIONS', 100),
        corsOrigins: env.CORS_ORIGINS
            ? readList(env, 'CORS_ORIGINS', [])
            : ['http://localhost:3000', 'http://localhost:3001', /^https?:\/\/.*\.vercel\.app$/],
    });
}

export function assertModelCredentials(config: AppConfig) {
    if (!config.googleApiKey) {
        throw new Error('GOOGLE_API_KEY (or GEMINI_API_KEY) is not set in environment variables.');
    }
}
