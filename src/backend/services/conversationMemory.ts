/**
 * Conversation Memory
 *
 * Append-only log of question/answer turns for one chat session, with a
 * bounded view of the most recent turns for prompt building.
 */

import { ConversationTurn } from '../../shared/types';

/** Turns included in the Q&A prompt (3 exchanges = 6 messages) */
export const DEFAULT_HISTORY_TURNS = 3;

/** Rendered in place of history when nothing has been said yet */
export const NO_HISTORY_PLACEHOLDER = 'No previous conversation';

export class ConversationMemory {
    private turns: ConversationTurn[] = [];

    append(question: string, answer: string): void {
        this.turns.push({ question, answer });
    }

    /**
     * The last `nTurns` turns, oldest first.
     */
    recent(nTurns: number = DEFAULT_HISTORY_TURNS): ConversationTurn[] {
        if (nTurns <= 0) {
            return [];
        }
        return this.turns.slice(-nTurns).map((turn) => ({ ...turn }));
    }

    all(): ConversationTurn[] {
        return this.turns.map((turn) => ({ ...turn }));
    }

    size(): number {
        return this.turns.length;
    }

    clear(): void {
        this.turns = [];
    }

    /**
     * Render recent turns as `Human:` / `Assistant:` lines.
     */
    formatHistory(nTurns: number = DEFAULT_HISTORY_TURNS): string {
        const lines: string[] = [];
        for (const turn of this.recent(nTurns)) {
            lines.push(`Human: ${turn.question}`);
            lines.push(`Assistant: ${turn.answer}`);
        }
        return lines.length > 0 ? lines.join('\n') : NO_HISTORY_PLACEHOLDER;
    }
}

export function createConversationMemory(): ConversationMemory {
    return new ConversationMemory();
}
