/**
 * Unit tests for Document Chunker
 *
 * Covers the sliding window, automatic tier selection and configuration
 * validation. Property tests check that chunks always cover the text and
 * that consecutive chunks share exactly the configured overlap.
 */

import * as fc from 'fast-check';
import {
    AUTOMATIC_CHUNKING_TIERS,
    DocumentChunker,
    resolveChunkingStrategy,
    splitIntoChunks,
    validateChunkingConfig,
} from '../documentChunker';
import { ConfigurationError } from '../../errors';
import { RAG_TEXT } from './fixtures';

/** size in [1, 60], overlap in [0, size - 1] */
const chunkingConfigArb = fc
    .integer({ min: 1, max: 60 })
    .chain((chunkSize) =>
        fc.record({
            chunkSize: fc.constant(chunkSize),
            chunkOverlap: fc.integer({ min: 0, max: chunkSize - 1 }),
        })
    );

const codePoints = (text: string): string[] => Array.from(text);

/** Unpaired UTF-16 surrogate at either edge */
const LONE_SURROGATE_EDGE = /^[\uDC00-\uDFFF]|[\uD800-\uDBFF]$/;

describe('splitIntoChunks', () => {
    it('should return no chunks for empty text', () => {
        expect(splitIntoChunks('', { chunkSize: 10, chunkOverlap: 2 })).toEqual([]);
    });

    it('should return a single chunk when the text fits in one window', () => {
        const chunks = splitIntoChunks('hello', { chunkSize: 10, chunkOverlap: 2 });

        expect(chunks).toEqual([{ id: 0, text: 'hello', sourceOffset: { start: 0, end: 5 } }]);
    });

    it('should split with overlap and sequential ids', () => {
        const chunks = splitIntoChunks(RAG_TEXT, { chunkSize: 50, chunkOverlap: 10 });

        expect(chunks.map((c) => c.id)).toEqual([0, 1, 2]);
        expect(chunks.map((c) => c.text)).toEqual([
            'RAG combines retrieval with generation. LangChain ',
            'LangChain provides tools for building RAG pipeline',
            'G pipelines.',
        ]);
        expect(chunks.map((c) => c.sourceOffset)).toEqual([
            { start: 0, end: 50 },
            { start: 40, end: 90 },
            { start: 80, end: 92 },
        ]);
    });

    it('should keep a surrogate pair inside one chunk', () => {
        const chunks = splitIntoChunks('ab\u{1F600}cd', { chunkSize: 3, chunkOverlap: 0 });

        expect(chunks.map((c) => c.text)).toEqual(['ab\u{1F600}', 'cd']);
        expect(chunks.map((c) => c.sourceOffset)).toEqual([
            { start: 0, end: 4 },
            { start: 4, end: 6 },
        ]);
    });

    it('should overlap by whole code points', () => {
        const chunks = splitIntoChunks('ab\u{1F600}cd', { chunkSize: 3, chunkOverlap: 1 });

        expect(chunks.map((c) => c.text)).toEqual(['ab\u{1F600}', '\u{1F600}cd']);
        expect(chunks.map((c) => c.sourceOffset)).toEqual([
            { start: 0, end: 4 },
            { start: 2, end: 6 },
        ]);
    });

    it('should produce frozen chunks', () => {
        const [first] = splitIntoChunks('abcdef', { chunkSize: 4, chunkOverlap: 1 });
        expect(Object.isFrozen(first)).toBe(true);
    });

    it('should reject invalid configuration before splitting', () => {
        expect(() => splitIntoChunks('abc', { chunkSize: 3, chunkOverlap: 3 })).toThrow(
            ConfigurationError
        );
    });

    it('property: chunks reconstruct the text', () => {
        fc.assert(
            fc.property(
                fc.fullUnicodeString({ maxLength: 400 }),
                chunkingConfigArb,
                (text, config) => {
                    const chunks = splitIntoChunks(text, config);
                    const [first, ...rest] = chunks;
                    if (!first) {
                        return text === '';
                    }

                    const rebuilt =
                        first.text +
                        rest
                            .map((c) => codePoints(c.text).slice(config.chunkOverlap).join(''))
                            .join('');
                    return rebuilt === text;
                }
            ),
            { numRuns: 200 }
        );
    });

    it('property: consecutive chunks share exactly the overlap', () => {
        fc.assert(
            fc.property(
                fc.fullUnicodeString({ maxLength: 400 }),
                chunkingConfigArb,
                (text, config) => {
                    const chunks = splitIntoChunks(text, config);

                    for (let i = 1; i < chunks.length; i++) {
                        const prev = chunks[i - 1];
                        const next = chunks[i];
                        if (!prev || !next) {
                            return false;
                        }
                        const prevPoints = codePoints(prev.text);
                        if (prevPoints.length !== config.chunkSize) {
                            return false;
                        }
                        const tail = prevPoints.slice(prevPoints.length - config.chunkOverlap);
                        const head = codePoints(next.text).slice(0, config.chunkOverlap);
                        if (head.join('') !== tail.join('')) {
                            return false;
                        }
                    }
                    return chunks.every((c) => codePoints(c.text).length <= config.chunkSize);
                }
            ),
            { numRuns: 200 }
        );
    });

    it('property: offsets locate each chunk and never split a surrogate pair', () => {
        fc.assert(
            fc.property(
                fc.fullUnicodeString({ maxLength: 200 }),
                chunkingConfigArb,
                (text, config) =>
                    splitIntoChunks(text, config).every(
                        (c) =>
                            c.sourceOffset !== undefined &&
                            text.slice(c.sourceOffset.start, c.sourceOffset.end) === c.text &&
                            !LONE_SURROGATE_EDGE.test(c.text)
                    )
            ),
            { numRuns: 200 }
        );
    });
});

describe('validateChunkingConfig', () => {
    it.each([
        [{ chunkSize: 0, chunkOverlap: 0 }],
        [{ chunkSize: -5, chunkOverlap: 0 }],
        [{ chunkSize: 10.5, chunkOverlap: 2 }],
        [{ chunkSize: 10, chunkOverlap: -1 }],
        [{ chunkSize: 10, chunkOverlap: 10 }],
        [{ chunkSize: 10, chunkOverlap: 20 }],
    ])('should reject %o', (config) => {
        expect(() => validateChunkingConfig(config)).toThrow(ConfigurationError);
    });

    it('should accept zero overlap', () => {
        expect(() => validateChunkingConfig({ chunkSize: 10, chunkOverlap: 0 })).not.toThrow();
    });
});

describe('resolveChunkingStrategy', () => {
    it.each([
        [0, 500, 100],
        [4999, 500, 100],
        [5000, 1000, 200],
        [49999, 1000, 200],
        [50000, 1500, 300],
    ])('should pick the tier for a %i character document', (length, chunkSize, chunkOverlap) => {
        expect(resolveChunkingStrategy('x'.repeat(length), { mode: 'automatic' })).toEqual({
            mode: 'automatic',
            chunkSize,
            chunkOverlap,
        });
    });

    it('should pass manual settings through', () => {
        expect(
            resolveChunkingStrategy('text', { mode: 'manual', chunkSize: 50, chunkOverlap: 10 })
        ).toEqual({ mode: 'manual', chunkSize: 50, chunkOverlap: 10 });
    });

    it('should reject manual overlap not smaller than size', () => {
        expect(() =>
            resolveChunkingStrategy('text', { mode: 'manual', chunkSize: 10, chunkOverlap: 10 })
        ).toThrow(ConfigurationError);
    });

    it('should keep every tier valid', () => {
        for (const tier of AUTOMATIC_CHUNKING_TIERS) {
            expect(tier.chunkOverlap).toBeLessThan(tier.chunkSize);
        }
    });

    it('property: automatic sizes never shrink as the document grows', () => {
        fc.assert(
            fc.property(
                fc.nat({ max: 120000 }),
                fc.nat({ max: 120000 }),
                (a, b) => {
                    const [shorter, longer] = a <= b ? [a, b] : [b, a];
                    const small = resolveChunkingStrategy('x'.repeat(shorter), {
                        mode: 'automatic',
                    });
                    const large = resolveChunkingStrategy('x'.repeat(longer), {
                        mode: 'automatic',
                    });
                    return (
                        small.chunkSize <= large.chunkSize &&
                        small.chunkOverlap <= large.chunkOverlap
                    );
                }
            ),
            { numRuns: 100 }
        );
    });
});

describe('DocumentChunker', () => {
    it('should return chunks together with the resolved strategy', () => {
        const result = new DocumentChunker().chunk(RAG_TEXT, { mode: 'automatic' });

        expect(result.strategy).toEqual({ mode: 'automatic', chunkSize: 500, chunkOverlap: 100 });
        expect(result.chunks).toHaveLength(1);
        expect(result.chunks[0]?.text).toBe(RAG_TEXT);
    });
});
