import { GoogleGenerativeAI } from '@google/generative-ai';
import { GoogleAIFileManager } from '@google/generative-ai/server';
import { errorMessage } from '../errors.js';
import { withDownloadedAudio, type AudioFile, type AudioLimits, type AudioRunner } from './audio.js';
import type { TranscriptProvider } from './transcript.js';

const TRANSCRIBE_PROMPT = 'Generate a verbatim transcript of the spoken content in this audio. Reply with the transcript text only.';

/** The slice of `GoogleAIFileManager` used for audio uploads. */
export interface GeminiFileStore {
    uploadFile(
        filePath: string,
        metadata: { mimeType: string; displayName?: string },
    ): Promise<{ file: { name: string; uri: string; mimeType: string } }>;
    deleteFile(name: string): Promise<void>;
}

/** The slice of a Gemini `GenerativeModel` used for transcription. */
export interface GeminiTranscriber {
    generateContent(
        request: (string | { fileData: { fileUri: string; mimeType: string } })[],
    ): Promise<{ response: { text(): string } }>;
}

export interface GeminiAudioDeps {
    files?: GeminiFileStore;
    model?: GeminiTranscriber;
    runAudio?: AudioRunner;
}

/**
 * Last-resort speech-to-text: uploads the downloaded audio through the Gemini
 * file API, asks the model for a transcript and deletes the upload.
 */
export class GeminiAudioProvider implements TranscriptProvider {
    readonly name = 'gemini' as const;
    private readonly files: GeminiFileStore;
    private readonly model: GeminiTranscriber;
    private readonly runAudio: AudioRunner;

    constructor(apiKey: string, modelName: string, private readonly limits: AudioLimits, deps: GeminiAudioDeps = {}) {
        this.files = deps.files ?? new GoogleAIFileManager(apiKey);
        this.model = deps.model ?? new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: modelName });
        this.runAudio = deps.runAudio ?? withDownloadedAudio;
    }

    async fetchTranscript(videoId: string): Promise<string | null> {
        console.log(`[gemini] Using Gemini audio transcription for ${videoId}`);
        const text = await this.runAudio(videoId, this.limits, audio => this.transcribe(videoId, audio));
        if (text === null) {
            return null;
        }

        console.log(`[gemini] Transcribed ${videoId} (${text.length} chars)`);
        return text || null;
    }

    private async transcribe(videoId: string, audio: AudioFile): Promise<string> {
        const { file } = await this.files.uploadFile(audio.path, { mimeType: audio.mimeType, displayName: videoId });

        try {
            const result = await this.model.generateContent([
                TRANSCRIBE_PROMPT,
                { fileData: { fileUri: file.uri, mimeType: file.mimeType } },
            ]);
            return result.response.text().trim();
        } finally {
            await this.files.deleteFile(file.name).catch((error: unknown) => {
                console.warn(`[gemini] Could not delete uploaded file ${file.name}:`, errorMessage(error));
            });
        }
    }
}
