/**
 * In-process stand-ins for the embedding and language-model capabilities.
 */

import { ContentItem } from '../../../shared/types';

/**
 * Embeds text as keyword presence flags plus a constant component, so
 * every vector is non-zero and texts sharing keywords score higher.
 */
export function createKeywordEmbedder(vocabulary: string[]) {
    const embed = jest.fn(async (text: string): Promise<number[]> => {
        const lower = text.toLowerCase();
        return [...vocabulary.map((word) => (lower.includes(word) ? 1 : 0)), 1];
    });
    return { embed };
}

export function createFakeLanguageModel(answer: string = 'Generated answer') {
    const generate = jest.fn(async (_prompt: string): Promise<string> => answer);
    return { generate };
}

export function makeItem(overrides: Partial<ContentItem> = {}): ContentItem {
    return {
        content: 'AI is transforming industries.',
        url: 'https://example.com',
        title: 'AI Revolution',
        sourceName: 'example.com',
        success: true,
        ...overrides,
    };
}

/**
 * Silence console output for the duration of each test.
 */
export function silenceConsole(): void {
    let spies: jest.SpyInstance[] = [];

    beforeEach(() => {
        spies = [
            jest.spyOn(console, 'log').mockImplementation(() => undefined),
            jest.spyOn(console, 'error').mockImplementation(() => undefined),
        ];
    });

    afterEach(() => {
        spies.forEach((spy) => spy.mockRestore());
    });
}
