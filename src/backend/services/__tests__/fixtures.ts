/**
 * Test doubles shared by the service tests.
 *
 * The concept embedder maps words onto two "topics" so that similarity is
 * predictable: one axis for RAG vocabulary, one for tooling vocabulary.
 */

import {
    CallOptions,
    CompletionInputs,
    LanguageModelCapability,
    UploadedDocument,
} from '../../../shared/types';
import { CONTEXTUALIZE_PROMPT } from '../queryRewriter';

export const RAG_TEXT =
    'RAG combines retrieval with generation. LangChain provides tools for building RAG pipelines.';

const CONCEPTS: ReadonlyArray<ReadonlySet<string>> = [
    new Set(['rag', 'retrieval', 'generation', 'combines']),
    new Set(['langchain', 'tools', 'building', 'provides', 'pipeline', 'pipelines']),
];

export function conceptEmbedding(text: string): number[] {
    const words = text.toLowerCase().split(/[^a-z]+/).filter(Boolean);
    return CONCEPTS.map((concept) => words.filter((word) => concept.has(word)).length);
}

export function txtDocument(text: string, name = 'notes.txt'): UploadedDocument {
    return { name, type: 'txt', data: Buffer.from(text, 'utf-8') };
}

export type StubCapability = LanguageModelCapability & {
    embed: jest.Mock<Promise<number[]>, [string, CallOptions?]>;
    complete: jest.Mock<Promise<string>, [string, CompletionInputs, CallOptions?]>;
};

/**
 * Capability whose rewrite and answer behaviour can be swapped per test.
 * By default the rewrite echoes the input and the answer names the input.
 */
export function createStubCapability(
    behaviour: {
        rewrite?: (inputs: CompletionInputs) => Promise<string>;
        answer?: (inputs: CompletionInputs, options?: CallOptions) => Promise<string>;
    } = {}
): StubCapability {
    const rewrite = behaviour.rewrite ?? (async (inputs: CompletionInputs) => inputs.input);
    const answer =
        behaviour.answer ?? (async (inputs: CompletionInputs) => `Answer to: ${inputs.input}`);

    return {
        embed: jest.fn(async (text: string, _options?: CallOptions) => conceptEmbedding(text)),
        complete: jest.fn(
            async (prompt: string, inputs: CompletionInputs, options?: CallOptions) =>
                prompt === CONTEXTUALIZE_PROMPT ? rewrite(inputs) : answer(inputs, options)
        ),
    };
}

export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
