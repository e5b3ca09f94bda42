import { describe, expect, it } from 'vitest';
import { splitTranscript } from './chunker.js';

const words = (prefix: string) => [1, 2, 3].map(n => `${prefix}000${n}`).join(' ');

describe('splitTranscript', () => {
    it('packs whole words into chunks no longer than the chunk size', async () => {
        const text = `${words('apple')} ${words('berry')}\n\n${words('melon')}`;

        const chunks = await splitTranscript(text, { chunkSize: 29, chunkOverlap: 0 });

        expect(chunks).toEqual([words('apple'), words('berry'), words('melon')]);
        expect(chunks.every(chunk => chunk.length <= 29)).toBe(true);
    });

    it('repeats trailing words at the start of the next chunk when overlapping', async () => {
        const text = `${words('apple')} ${words('berry')} ${words('melon')}`;

        const chunks = await splitTranscript(text, { chunkSize: 29, chunkOverlap: 10 });

        expect(chunks).toEqual([
            'apple0001 apple0002 apple0003',
            'apple0003 berry0001 berry0002',
            'berry0002 berry0003 melon0001',
            'melon0001 melon0002 melon0003',
        ]);
    });

    it('returns a single chunk for short text', async () => {
        await expect(splitTranscript('  just a few words ', { chunkSize: 1000, chunkOverlap: 200 })).resolves.toEqual([
            'just a few words',
        ]);
    });

    it('returns no chunks for blank text', async () => {
        await expect(splitTranscript(' \n\t ', { chunkSize: 1000, chunkOverlap: 200 })).resolves.toEqual([]);
    });

    it('rejects an overlap that is not smaller than the chunk size', async () => {
        await expect(splitTranscript('text', { chunkSize: 10, chunkOverlap: 10 })).rejects.toThrow(
            'chunkOverlap (10) must be smaller than chunkSize (10)',
        );
    });
});
