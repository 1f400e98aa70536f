/**
 * Unit tests for Retriever
 */

import { IndexNotBuiltError } from '../../errors';
import { EmbeddingClient } from '../embeddingClient';
import { retrieve } from '../retriever';
import { splitIntoChunks } from '../documentChunker';
import { createVectorIndex } from '../vectorStore';
import { createStubCapability, RAG_TEXT } from './fixtures';

async function buildRagIndex() {
    const capability = createStubCapability();
    const embedder = new EmbeddingClient(capability);
    const index = createVectorIndex('cosine');
    await index.build(splitIntoChunks(RAG_TEXT, { chunkSize: 50, chunkOverlap: 10 }), embedder);
    capability.embed.mockClear();
    return { capability, embedder, index };
}

describe('retrieve', () => {
    it('should embed the question once and return chunks in index order', async () => {
        const { capability, embedder, index } = await buildRagIndex();

        const chunks = await retrieve(index, 'What is RAG?', embedder, 2);

        expect(chunks.map((c) => c.id)).toEqual([0, 1]);
        expect(capability.embed).toHaveBeenCalledTimes(1);
        expect(capability.embed).toHaveBeenCalledWith('What is RAG?');
    });

    it('should return every chunk when k exceeds the index size', async () => {
        const { embedder, index } = await buildRagIndex();

        const chunks = await retrieve(index, 'What is RAG?', embedder, 10);

        expect(chunks.map((c) => c.id)).toEqual([0, 1, 2]);
    });

    it('should return nothing for k = 0 without embedding', async () => {
        const { capability, embedder, index } = await buildRagIndex();

        await expect(retrieve(index, 'What is RAG?', embedder, 0)).resolves.toEqual([]);
        expect(capability.embed).not.toHaveBeenCalled();
    });

    it('should throw IndexNotBuiltError for an unbuilt index', async () => {
        const embedder = new EmbeddingClient(createStubCapability());

        await expect(
            retrieve(createVectorIndex(), 'What is RAG?', embedder, 4)
        ).rejects.toThrow(IndexNotBuiltError);
    });
});
