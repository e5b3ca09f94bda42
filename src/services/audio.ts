import ytdl from '@distube/ytdl-core';
import { createWriteStream } from 'fs';
import { mkdtemp, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { watchUrl } from '../utils/videoId.js';

export interface AudioLimits {
    maxVideoLengthSec: number;
    maxAudioBytes: number;
}

/** The parts of a ytdl format the download planner looks at. */
export interface AudioFormatCandidate {
    hasAudio: boolean;
    hasVideo: boolean;
    audioBitrate?: number | null;
    mimeType?: string;
}

export type AudioPlan<F extends AudioFormatCandidate> =
    | { ok: true; format: F; estimatedBytes: number }
    | { ok: false; reason: string };

export interface AudioFile {
    path: string;
    filename: string;
    mimeType: string;
    size: number;
}

export const estimateAudioBytes = (bitrateKbps: number, lengthSeconds: number): number =>
    (bitrateKbps * 1024 / 8) * lengthSeconds;

/**
 * Chooses the cheapest audio-only stream, rejecting videos that are too long
 * or whose audio would be too large to send for transcription.
 */
export function planAudioDownload<F extends AudioFormatCandidate>(
    lengthSeconds: number,
    formats: F[],
    limits: AudioLimits,
): AudioPlan<F> {
    if (lengthSeconds > limits.maxVideoLengthSec) {
        return {
            ok: false,
            reason: `Exceeds max length (${lengthSeconds} sec > ${limits.maxVideoLengthSec} sec)`,
        };
    }

    const audioOnly = formats
        .filter(format => format.hasAudio && !format.hasVideo && typeof format.audioBitrate === 'number')
        .sort((a, b) => (a.audioBitrate ?? 0) - (b.audioBitrate ?? 0));

    const format = audioOnly[0];
    if (!format) {
        return { ok: false, reason: 'No audio stream' };
    }

    const estimatedBytes = estimateAudioBytes(format.audioBitrate ?? 0, lengthSeconds);
    if (estimatedBytes > limits.maxAudioBytes) {
        const gib = 1024 ** 3;
        return {
            ok: false,
            reason: `Estimated size (${(estimatedBytes / gib).toFixed(2)} GB > ${(limits.maxAudioBytes / gib).toFixed(2)} GB)`,
        };
    }

    return { ok: true, format, estimatedBytes };
}

const extensionFor = (mimeType: string) => (mimeType.includes('webm') ? 'webm' : 'mp4');

/** A video's audio streams, as seen by the downloader. */
export interface AudioSource {
    lengthSeconds: number;
    formats: AudioFormatCandidate[];
    open(format: AudioFormatCandidate): Readable;
}

export type AudioSourceLoader = (videoId: string) => Promise<AudioSource>;

export async function loadYtdlAudioSource(videoId: string): Promise<AudioSource> {
    const info = await ytdl.getInfo(watchUrl(videoId));
    return {
        lengthSeconds: parseInt(info.videoDetails.lengthSeconds, 10) || 0,
        formats: info.formats,
        open(format) {
            const chosen = info.formats.find(candidate => candidate === format);
            if (!chosen) {
                throw new Error(`Format is not one of ${videoId}'s formats`);
            }
            return ytdl.downloadFromInfo(info, { format: chosen });
        },
    };
}

export interface DownloadOptions {
    load?: AudioSourceLoader;
    tmpRoot?: string;
}

/**
 * Downloads the lowest-bitrate audio stream of a video into a fresh temp
 * directory and hands the file to `use`. The directory is removed once `use`
 * settles, whatever the outcome. Returns null when the video is outside the
 * configured limits or nothing was saved.
 */
export async function withDownloadedAudio<T>(
    videoId: string,
    limits: AudioLimits,
    use: (audio: AudioFile) => Promise<T>,
    { load = loadYtdlAudioSource, tmpRoot = tmpdir() }: DownloadOptions = {},
): Promise<T | null> {
    const source = await load(videoId);
    const plan = planAudioDownload(source.lengthSeconds, source.formats, limits);

    if (!plan.ok) {
        console.log(`[audio] Skipping ${videoId}: ${plan.reason}`);
        return null;
    }

    const mimeType = (plan.format.mimeType ?? 'audio/mp4').split(';')[0]?.trim() || 'audio/mp4';
    const filename = `audio.${extensionFor(mimeType)}`;
    const tmpDir = await mkdtemp(join(tmpRoot, 'yt-audio-'));
    const path = join(tmpDir, filename);

    try {
        await pipeline(source.open(plan.format), createWriteStream(path));

        const { size } = await stat(path);
        if (size === 0) {
            console.log(`[audio] No audio saved for ${videoId}`);
            return null;
        }

        console.log(`[audio] Downloaded ${size} bytes of ${mimeType} for ${videoId}`);
        return await use({ path, filename, mimeType, size });
    } finally {
        await rm(tmpDir, { recursive: true, force: true });
    }
}

export type AudioRunner = <T>(
    videoId: string,
    limits: AudioLimits,
    use: (audio: AudioFile) => Promise<T>,
) => Promise<T | null>;
