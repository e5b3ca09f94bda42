import { fetchTranscript } from 'youtube-transcript-plus';
import { errorMessage } from '../errors.js';
import type { TranscriptProvider } from './transcript.js';

export interface CaptionSegment {
    text: string;
}

export type CaptionFetcher = (videoId: string, options?: { lang?: string }) => Promise<CaptionSegment[]>;

const ENTITIES: Record<string, string> = {
    '&amp;': '&',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#39;': "'",
    '&apos;': "'",
};

const fromCodePoint = (codePoint: number, entity: string): string =>
    codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;

export function decodeCaptionText(text: string): string {
    return text
        .replace(/&(?:amp|lt|gt|quot|apos|#39);/g, entity => ENTITIES[entity] ?? entity)
        .replace(/&#(\d+);/g, (entity, code: string) => fromCodePoint(parseInt(code, 10), entity))
        .replace(/&#[xX]([0-9a-fA-F]+);/g, (entity, hex: string) => fromCodePoint(parseInt(hex, 16), entity))
        .replace(/\s+/g, ' ')
        .trim();
}

export const joinSegments = (segments: CaptionSegment[]): string =>
    segments.map(segment => decodeCaptionText(segment.text)).filter(Boolean).join(' ');

/**
 * Caption track lookup. Each preferred language is tried in turn, then
 * whatever track YouTube serves by default.
 */
export class CaptionsProvider implements TranscriptProvider {
    readonly name = 'captions' as const;

    constructor(
        private readonly languages: string[],
        private readonly fetcher: CaptionFetcher = fetchTranscript,
    ) {}

    async fetchTranscript(videoId: string): Promise<string | null> {
        for (const lang of this.languages) {
            try {
                const text = joinSegments(await this.fetcher(videoId, { lang }));
                if (text) {
                    console.log(`[captions] Found ${lang} captions for ${videoId}`);
                    return text;
                }
            } catch (error) {
                console.warn(`[captions] Fetch failed for lang ${lang}:`, errorMessage(error));
            }
        }

        try {
            const text = joinSegments(await this.fetcher(videoId));
            if (text) {
                console.log(`[captions] Found default captions for ${videoId}`);
                return text;
            }
        } catch (error) {
            console.warn('[captions] Fetch without lang failed:', errorMessage(error));
        }

        console.log(`[captions] No captions found for ${videoId}`);
        return null;
    }
}
