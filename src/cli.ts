#!/usr/bin/env node

/**
 * Summarize a YouTube video from the command line.
 *
 * Usage: yt-rag-chat <youtube-url-or-video-id> [--points]
 */

import { createInterface } from 'readline/promises';
import { assertModelCredentials, loadConfig, loadEnvFile } from './config.js';
import { errorMessage } from './errors.js';
import { createChatModel } from './services/models.js';
import { summarizeTranscript } from './services/summarize.js';
import { createTranscriptService } from './services/transcript.js';
import { extractVideoId } from './utils/videoId.js';

async function promptForUrl(): Promise<string> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        return await rl.question('Enter the YouTube video URL: ');
    } finally {
        rl.close();
    }
}

async function main(): Promise<number> {
    loadEnvFile();
    const config = loadConfig();
    assertModelCredentials(config);

    const args = process.argv.slice(2);
    const points = args.includes('--points');
    const input = args.find(arg => !arg.startsWith('--')) ?? await promptForUrl();

    const videoId = extractVideoId(input);
    if (!videoId) {
        console.error(`Could not extract video ID from the URL: ${input}`);
        return 1;
    }

    const transcripts = createTranscriptService(config);
    let transcript: string;
    try {
        transcript = (await transcripts.getTranscript(videoId)).text;
    } catch (error) {
        console.error(`Could not retrieve transcript for the video ID: ${videoId} (${errorMessage(error)})`);
        return 1;
    }

    const summary = await summarizeTranscript(createChatModel(config), transcript, {
        format: points ? 'points' : 'text',
    });
    console.log(summary);
    return 0;
}

main().then(
    code => { process.exitCode = code; },
    error => {
        console.error(`An error occurred: ${errorMessage(error)}`);
        console.error('Please ensure you have a valid API key and internet connection.');
        process.exitCode = 1;
    },
);
