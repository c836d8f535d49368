/**
 * Unit tests for Conversation Memory
 */

import * as fc from 'fast-check';
import { ConversationMemory, NO_HISTORY_PLACEHOLDER, createConversationMemory } from '../conversationMemory';

describe('ConversationMemory', () => {
    let memory: ConversationMemory;

    beforeEach(() => {
        memory = createConversationMemory();
    });

    it('should start empty', () => {
        expect(memory.size()).toBe(0);
        expect(memory.recent()).toEqual([]);
        expect(memory.formatHistory()).toBe(NO_HISTORY_PLACEHOLDER);
    });

    it('should return the most recent turns oldest first', () => {
        for (let i = 1; i <= 5; i++) {
            memory.append(`q${i}`, `a${i}`);
        }

        expect(memory.recent(3)).toEqual([
            { question: 'q3', answer: 'a3' },
            { question: 'q4', answer: 'a4' },
            { question: 'q5', answer: 'a5' },
        ]);
    });

    it('should default to the last three turns', () => {
        for (let i = 1; i <= 4; i++) {
            memory.append(`q${i}`, `a${i}`);
        }
        expect(memory.recent().map((turn) => turn.question)).toEqual(['q2', 'q3', 'q4']);
    });

    it('should return nothing for a non-positive count', () => {
        memory.append('q', 'a');
        expect(memory.recent(0)).toEqual([]);
        expect(memory.recent(-2)).toEqual([]);
    });

    it('should hand out copies of its turns', () => {
        memory.append('q', 'a');
        const [turn] = memory.recent(1);
        if (turn) {
            turn.answer = 'changed';
        }
        expect(memory.all()).toEqual([{ question: 'q', answer: 'a' }]);
    });

    it('should format turns as Human and Assistant lines', () => {
        memory.append('What is AI?', 'A field of study.');
        memory.append('Who uses it?', 'Many industries.');

        expect(memory.formatHistory(2)).toBe(
            'Human: What is AI?\nAssistant: A field of study.\nHuman: Who uses it?\nAssistant: Many industries.'
        );
    });

    it('should forget everything on clear', () => {
        memory.append('q1', 'a1');
        memory.append('q2', 'a2');
        memory.clear();

        expect(memory.size()).toBe(0);
        expect(memory.recent(6)).toEqual([]);
    });

    it('should return min(n, size) turns', () => {
        fc.assert(
            fc.property(fc.nat(20), fc.integer({ min: -5, max: 30 }), (count, n) => {
                const log = createConversationMemory();
                for (let i = 0; i < count; i++) {
                    log.append(`q${i}`, `a${i}`);
                }
                return log.recent(n).length === Math.max(0, Math.min(n, count));
            })
        );
    });
});
