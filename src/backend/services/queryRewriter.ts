/**
 * Query Rewriter
 *
 * Turns the latest message into a standalone question that can be
 * understood without the conversation, e.g. "does that work with
 * langchain?" after a question about RAG becomes "Does RAG work with
 * LangChain?". The standalone question drives retrieval only; the answer
 * step still sees what the user actually typed.
 */

import { HistoryMessage, LanguageModelCapability } from '../../shared/types';

export const CONTEXTUALIZE_PROMPT =
    'Given a chat history and the latest user question ' +
    'which might reference context in the chat history, ' +
    'formulate a standalone question which can be understood ' +
    'without the chat history. Do NOT answer the question, ' +
    'just reformulate it if needed and otherwise return it as is.';

export interface IQueryRewriter {
    rewrite(history: readonly HistoryMessage[], latestMessage: string): Promise<string>;
}

export class QueryRewriter implements IQueryRewriter {
    constructor(private readonly capability: LanguageModelCapability) {}

    /**
     * With no prior turns the message is already standalone and is returned
     * unchanged. A failed or empty rewrite falls back to the message itself,
     * so retrieval always has a question to work with.
     */
    async rewrite(history: readonly HistoryMessage[], latestMessage: string): Promise<string> {
        if (history.length === 0) {
            return latestMessage;
        }

        try {
            const standalone = await this.capability.complete(CONTEXTUALIZE_PROMPT, {
                history,
                input: latestMessage,
            });
            const trimmed = standalone.trim();
            if (trimmed.length === 0) {
                console.warn('Query rewrite returned no text, using the original message');
                return latestMessage;
            }
            return trimmed;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`Query rewrite failed, using the original message: ${message}`);
            return latestMessage;
        }
    }
}

export function createQueryRewriter(capability: LanguageModelCapability): QueryRewriter {
    return new QueryRewriter(capability);
}
