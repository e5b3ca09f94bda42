import type { AppConfig, TranscriptSource } from '../config.js';
import { HttpError, errorMessage } from '../errors.js';
import { CaptionsProvider } from './captions.js';
import { GeminiAudioProvider } from './geminiAudio.js';
import { WhisperProvider } from './whisper.js';

export interface TranscriptProvider {
    readonly name: TranscriptSource;
    fetchTranscript(videoId: string): Promise<string | null>;
}

export interface TranscriptResult {
    videoId: string;
    text: string;
    source: TranscriptSource;
}

export interface TranscriptFetcher {
    getTranscript(videoId: string): Promise<TranscriptResult>;
}

/**
 * Tries each provider in order until one produces text. A provider that
 * throws is logged and skipped.
 */
export class TranscriptService implements TranscriptFetcher {
    constructor(
        private readonly providers: TranscriptProvider[],
        private readonly maxChars: number,
    ) {}

    get providerNames(): TranscriptSource[] {
        return this.providers.map(provider => provider.name);
    }

    async getTranscript(videoId: string): Promise<TranscriptResult> {
        for (const provider of this.providers) {
            let text: string | null;
            try {
                text = await provider.fetchTranscript(videoId);
            } catch (error) {
                console.warn(`[transcript] ${provider.name} failed for ${videoId}:`, errorMessage(error));
                continue;
            }

            const transcript = text?.trim();
            if (!transcript) {
                continue;
            }

            if (transcript.length > this.maxChars) {
                throw new HttpError(`Transcript too long (${transcript.length} chars, max ${this.maxChars})`, 413);
            }

            console.log(`[transcript] ${videoId} retrieved via ${provider.name} (${transcript.length} chars)`);
            return { videoId, text: transcript, source: provider.name };
        }

        console.log(`[transcript] ${videoId}: all retrieval methods failed`);
        throw new HttpError('Transcript not found', 404);
    }
}

/** Builds the provider chain from config, skipping providers without credentials. */
export function createTranscriptService(config: AppConfig): TranscriptService {
    const limits = { maxVideoLengthSec: config.maxVideoLengthSec, maxAudioBytes: config.maxAudioBytes };
    const providers: TranscriptProvider[] = [];

    for (const name of config.transcriptProviders) {
        switch (name) {
            case 'captions':
                providers.push(new CaptionsProvider(config.transcriptLanguages));
                break;
            case 'whisper':
                if (config.groqApiKey) {
                    providers.push(new WhisperProvider(
                        { apiKey: config.groqApiKey, model: config.whisperModel, endpoint: config.whisperEndpoint },
                        limits,
                    ));
                } else {
                    console.log('[transcript] GROQ_API_KEY not set, Whisper fallback disabled');
                }
                break;
            case 'gemini':
                if (config.googleApiKey) {
                    providers.push(new GeminiAudioProvider(config.googleApiKey, config.chatModel, limits));
                } else {
                    console.log('[transcript] Google API key not set, Gemini audio fallback disabled');
                }
                break;
        }
    }

    return new TranscriptService(providers, config.maxTranscriptChars);
}
