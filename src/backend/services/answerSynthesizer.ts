/**
 * Answer Synthesizer
 *
 * The "generation" half of RAG: the retrieved chunks become the grounding
 * context, the full conversation history keeps the answer conversational,
 * and the question is the one the user actually asked. The standalone
 * question produced for retrieval is never part of this prompt.
 */

import {
  Chunk,
  HistoryMessage,
  LanguageModelCapability,
} from '../../shared/types';

export const ANSWER_INSTRUCTIONS =
  'You are an expert assistant for question-answering tasks. ' +
  'Use the provided context to answer the question. ' +
  "If you don't know the answer, just say that you don't know. " +
  'Keep the answer concise and use a maximum of three sentences.';

export const NO_CONTEXT_NOTICE =
  'No passages from the document matched this question. ' +
  'Tell the user the document does not seem to cover it.';

export interface SynthesisResult {
  answer: string;
  usedSources: Chunk[];
}

export interface IAnswerSynthesizer {
  synthesize(
    originalQuestion: string,
    history: readonly HistoryMessage[],
    retrievedChunks: readonly Chunk[]
  ): Promise<SynthesisResult>;
}

/**
 * The "Context:" block of a grounded prompt, one labelled section per chunk.
 */
export function formatContext(chunks: readonly Chunk[], emptyNotice: string): string {
  if (chunks.length === 0) {
    return `Context: ${emptyNotice}`;
  }
  return ['Context:', ...chunks.map((chunk) => `[Chunk ${chunk.id}]\n${chunk.text}`)].join('\n');
}

/**
 * Build the system prompt: instructions followed by the grounding context.
 */
export function buildAnswerPrompt(chunks: readonly Chunk[]): string {
  return [ANSWER_INSTRUCTIONS, '', formatContext(chunks, NO_CONTEXT_NOTICE)].join('\n');
}

export class AnswerSynthesizer implements IAnswerSynthesizer {
  constructor(private readonly capability: LanguageModelCapability) {}

  /**
   * Capability errors propagate unchanged; a failed synthesis never turns
   * into a made-up answer. Every retrieved chunk is reported as a source.
   */
  async synthesize(
    originalQuestion: string,
    history: readonly HistoryMessage[],
    retrievedChunks: readonly Chunk[]
  ): Promise<SynthesisResult> {
    const answer = await this.capability.complete(buildAnswerPrompt(retrievedChunks), {
      history,
      input: originalQuestion,
    });

    return {
      answer: answer.trim(),
      usedSources: [...retrievedChunks],
    };
  }
}

export function createAnswerSynthesizer(capability: LanguageModelCapability): AnswerSynthesizer {
  return new AnswerSynthesizer(capability);
}
