import { CharacterTextSplitter } from '@langchain/textsplitters';

export interface ChunkOptions {
    chunkSize: number;
    chunkOverlap: number;
}

/**
 * Cuts a transcript into fixed-size character windows on word boundaries.
 * Consecutive chunks share up to `chunkOverlap` characters.
 */
export async function splitTranscript(text: string, { chunkSize, chunkOverlap }: ChunkOptions): Promise<string[]> {
    if (chunkOverlap >= chunkSize) {
        throw new Error(`chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`);
    }

    const normalized = text.replace(/\s+/g, ' ').trim();
    if (!normalized) {
        return [];
    }

    const textSplitter = new CharacterTextSplitter({ separator: ' ', chunkSize, chunkOverlap });
    return await textSplitter.splitText(normalized);
}
