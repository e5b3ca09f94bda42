import { openAsBlob } from 'fs';
import { withDownloadedAudio, type AudioFile, type AudioLimits, type AudioRunner } from './audio.js';
import type { TranscriptProvider } from './transcript.js';

export interface WhisperOptions {
    apiKey: string;
    model: string;
    endpoint: string;
}

/** Sends one audio file to an OpenAI-compatible transcription endpoint. */
export async function transcribeAudio(
    audio: AudioFile,
    options: WhisperOptions,
    fetchImpl: typeof fetch = fetch,
): Promise<string> {
    const form = new FormData();
    form.append('file', await openAsBlob(audio.path, { type: audio.mimeType }), audio.filename);
    form.append('model', options.model);

    const resp = await fetchImpl(options.endpoint, {
        method: 'POST',
        headers: { Authorization: `Bearer ${options.apiKey}` },
        body: form,
    });

    if (resp.status !== 200) {
        throw new Error(`Whisper API error ${resp.status}: ${await resp.text()}`);
    }

    const body: unknown = await resp.json();
    if (typeof body === 'object' && body !== null && 'text' in body && typeof body.text === 'string') {
        return body.text.trim();
    }
    return '';
}

export class WhisperProvider implements TranscriptProvider {
    readonly name = 'whisper' as const;

    constructor(
        private readonly options: WhisperOptions,
        private readonly limits: AudioLimits,
        private readonly runAudio: AudioRunner = withDownloadedAudio,
        private readonly fetchImpl: typeof fetch = fetch,
    ) {}

    async fetchTranscript(videoId: string): Promise<string | null> {
        console.log(`[whisper] Using Whisper transcription for ${videoId}`);
        const text = await this.runAudio(videoId, this.limits, audio => transcribeAudio(audio, this.options, this.fetchImpl));
        if (text === null) {
            return null;
        }

        console.log(`[whisper] Transcribed ${videoId} (${text.length} chars)`);
        return text || null;
    }
}
