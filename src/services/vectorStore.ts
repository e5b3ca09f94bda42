import { VectorStore } from '@langchain/core/vectorstores';
import { Document, type DocumentInterface } from '@langchain/core/documents';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';

interface StoredVector {
    embedding: number[];
    document: DocumentInterface;
}

export const innerProduct = (a: number[], b: number[]): number => {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += (a[i] ?? 0) * (b[i] ?? 0);
    }
    return sum;
};

/**
 * Flat in-memory index. Every query scores all stored vectors by inner
 * product; there is no approximate structure.
 */
export class InnerProductVectorStore extends VectorStore {
    declare FilterType: (doc: DocumentInterface) => boolean;

    private vectors: StoredVector[] = [];

    constructor(embeddings: EmbeddingsInterface) {
        super(embeddings, {});
    }

    _vectorstoreType(): string {
        return 'inner-product';
    }

    get size(): number {
        return this.vectors.length;
    }

    get dimension(): number | undefined {
        return this.vectors[0]?.embedding.length;
    }

    async addDocuments(documents: DocumentInterface[]): Promise<void> {
        const texts = documents.map(({ pageContent }) => pageContent);
        return this.addVectors(await this.embeddings.embedDocuments(texts), documents);
    }

    async addVectors(vectors: number[][], documents: DocumentInterface[]): Promise<void> {
        if (vectors.length !== documents.length) {
            throw new Error(`Got ${vectors.length} vectors for ${documents.length} documents`);
        }

        const dimension = this.dimension ?? vectors[0]?.length;
        vectors.forEach((embedding, i) => {
            if (embedding.length !== dimension) {
                throw new Error(`Vector ${i} has dimension ${embedding.length}, index expects ${dimension}`);
            }
        });

        vectors.forEach((embedding, i) => {
            const document = documents[i];
            if (document) {
                this.vectors.push({ embedding, document });
            }
        });
    }

    async similaritySearchVectorWithScore(
        query: number[],
        k: number,
        filter?: this['FilterType'],
    ): Promise<[DocumentInterface, number][]> {
        if (this.dimension !== undefined && query.length !== this.dimension) {
            throw new Error(`Query has dimension ${query.length}, index expects ${this.dimension}`);
        }

        const scored = this.vectors
            .filter(({ document }) => !filter || filter(document))
            .map(({ embedding, document }) => ({ document, score: innerProduct(query, embedding) }));

        // Stable sort: ties keep insertion order.
        scored.sort((a, b) => b.score - a.score);

        return scored.slice(0, Math.max(0, k)).map(({ document, score }): [DocumentInterface, number] => [
            new Document({ pageContent: document.pageContent, metadata: { ...document.metadata } }),
            score,
        ]);
    }
}
