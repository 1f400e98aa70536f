import { HistoryMessage, Turn } from '../../shared/types';

/**
 * Append-only, ordered record of completed turns.
 *
 * Insertion order is the order the user saw, and it is used verbatim in
 * prompts. There is no way to remove or reorder turns; starting a fresh
 * conversation means replacing the history object.
 */
export class ConversationHistory {
    private readonly entries: Turn[] = [];

    get length(): number {
        return this.entries.length;
    }

    get turns(): readonly Turn[] {
        return [...this.entries];
    }

    /**
     * Append the turns of one completed exchange, all or nothing.
     */
    append(...turns: Turn[]): void {
        for (const turn of turns) {
            this.entries.push(Object.freeze({ ...turn, sources: [...turn.sources] }));
        }
    }

    toMessages(): HistoryMessage[] {
        return this.entries.map((turn) => ({ role: turn.role, content: turn.content }));
    }

    /**
     * Plain-text export, one "<role>: <content>" entry per turn in order.
     */
    toText(): string {
        return this.entries.map((turn) => `${turn.role}: ${turn.content}`).join('\n');
    }
}
