/**
 * Prompt templates for each generation mode.
 *
 * Templates use `{name}` placeholders. Every formatter is a pure function
 * of its variables; a placeholder without a value raises
 * MissingPromptVariableError instead of being rendered empty.
 */

import { MissingPromptVariableError } from '../errors';

// ============================================================================
// Templates
// ============================================================================

export const QA_PROMPT_TEMPLATE = `You are an intelligent research assistant analyzing content from multiple sources.

Your capabilities:
- Answer questions accurately based on provided context
- Cite specific sources when making claims
- Compare perspectives across different sources
- Identify gaps or contradictions in information
- Provide balanced, objective analysis

Guidelines:
1. ALWAYS cite which source you're referencing (use [Source Name])
2. If information conflicts across sources, acknowledge it
3. If the answer isn't in the context, say clearly that it was not found in the provided sources
4. Only use the context below; do not speculate beyond it
5. Be concise but comprehensive
6. Maintain objectivity - don't add personal opinions

Context from sources:
{context}

Chat History:
{chatHistory}

User Question: {question}

Answer:`;

export const COMPARISON_PROMPT_TEMPLATE = `You are comparing how different sources report on the same topic.

Task: Analyze the following sources and identify:
1. Common facts/themes across all sources
2. Unique perspectives or information from each source
3. Any contradictions or conflicting claims
4. Tone/framing differences (neutral, biased, emotional, etc.)

Sources:
{sourcesContent}

Provide a structured comparison:

**Common Ground:**
[What all sources agree on]

**Source-Specific Insights:**
{sourceBreakdown}

**Contradictions/Conflicts:**
[Any disagreements between sources]

**Tone Analysis:**
[How each source frames the topic]

Be objective and cite specific sources.`;

export const SUMMARY_PROMPT_TEMPLATE = `Generate a summary of the following content in {tone} tone.

Tone Guidelines:
- formal: Academic, professional, no contractions, precise language
- casual: Conversational, friendly, relatable, contractions okay
- eli5: Explain Like I'm 5 - simple words, analogies, no jargon

Content to summarize:
{content}

Length: {length} ({wordCount} words)

Summary:`;

export const SENTIMENT_PROMPT_TEMPLATE = `Analyze the sentiment and emotional tone of the following text.

Text:
{text}

Source: {source}

Provide analysis in this format:

**Overall Sentiment:** [Positive/Negative/Neutral/Mixed]

**Emotional Tone:** [e.g., optimistic, concerned, urgent, celebratory]

**Key Indicators:**
[List specific words/phrases that reveal sentiment]

**Objectivity Score:** [1-10, where 10 is completely neutral/objective]

**Reasoning:**
[Brief explanation of your analysis]`;

export const FACT_EXTRACTION_PROMPT_TEMPLATE = `Extract key factual claims from the following text.

For each fact, provide:
1. The claim (as stated)
2. Source attribution
3. Whether it's a fact, opinion, or speculation

Text:
{text}

Source: {source}

Format as a numbered list:

1. [FACT/OPINION/SPECULATION] - "claim text" (Source: {source})
2. [FACT/OPINION/SPECULATION] - "claim text" (Source: {source})
...

Focus on verifiable claims, statistics, quotes, and key assertions.`;

// ============================================================================
// Summary options
// ============================================================================

export const SUMMARY_TONES = ['formal', 'casual', 'eli5'] as const;
export type SummaryTone = (typeof SUMMARY_TONES)[number];

export const SUMMARY_LENGTHS = ['short', 'medium', 'long'] as const;
export type SummaryLength = (typeof SUMMARY_LENGTHS)[number];

const TONE_SET: ReadonlySet<string> = new Set(SUMMARY_TONES);
const LENGTH_SET: ReadonlySet<string> = new Set(SUMMARY_LENGTHS);

const WORD_COUNT_BANDS: Record<SummaryLength, string> = {
    short: '100-150',
    medium: '200-300',
    long: '400-500',
};

export function isSummaryTone(value: unknown): value is SummaryTone {
    return typeof value === 'string' && TONE_SET.has(value);
}

export function isSummaryLength(value: unknown): value is SummaryLength {
    return typeof value === 'string' && LENGTH_SET.has(value);
}

/**
 * Target word-count band for a summary length.
 * Unrecognized lengths get the medium band.
 */
export function getWordCountBand(length: string): string {
    return isSummaryLength(length) ? WORD_COUNT_BANDS[length] : WORD_COUNT_BANDS.medium;
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Substitute `{name}` placeholders in a single pass.
 * Values are inserted literally, so braces inside them are left alone.
 *
 * @throws MissingPromptVariableError for a placeholder without a string value
 */
export function renderTemplate(
    template: string,
    variables: Readonly<Record<string, string | undefined>>
): string {
    return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
        const value = variables[name];
        if (typeof value !== 'string') {
            throw new MissingPromptVariableError(name);
        }
        return value;
    });
}

export interface QaPromptVariables {
    context: string;
    chatHistory: string;
    question: string;
}

export interface ComparisonPromptVariables {
    sourcesContent: string;
    sourceBreakdown: string;
}

export interface SummaryPromptVariables {
    content: string;
    tone: SummaryTone;
    /** Free text; anything other than short/medium/long uses the medium band */
    length: string;
}

export interface SourceTextPromptVariables {
    text: string;
    source: string;
}

export function formatQaPrompt(variables: QaPromptVariables): string {
    return renderTemplate(QA_PROMPT_TEMPLATE, { ...variables });
}

export function formatComparisonPrompt(variables: ComparisonPromptVariables): string {
    return renderTemplate(COMPARISON_PROMPT_TEMPLATE, { ...variables });
}

export function formatSummaryPrompt(variables: SummaryPromptVariables): string {
    return renderTemplate(SUMMARY_PROMPT_TEMPLATE, {
        ...variables,
        wordCount: getWordCountBand(variables.length),
    });
}

export function formatSentimentPrompt(variables: SourceTextPromptVariables): string {
    return renderTemplate(SENTIMENT_PROMPT_TEMPLATE, { ...variables });
}

export function formatFactExtractionPrompt(variables: SourceTextPromptVariables): string {
    return renderTemplate(FACT_EXTRACTION_PROMPT_TEMPLATE, { ...variables });
}
