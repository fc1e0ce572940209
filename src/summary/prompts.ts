/**
 * Summary Prompt Templates
 *
 * Persona, constraints and tone are kept apart so each template reads as a
 * checklist; `renderSystemPrompt` flattens them for the chat call.
 */

import { NARRATION_WORDS_PER_MINUTE } from '../constants';
import { ChatMessage } from '../providers/types';

export interface PromptSection {
    content: string;
}

export interface PromptTemplate {
    persona: PromptSection;
    constraints: PromptSection[];
    tone: PromptSection[];
}

export const minutesOfNarration = (words: number): number => {
    return Math.round(words / NARRATION_WORDS_PER_MINUTE);
};

export const summaryTemplate = (targetWords: number): PromptTemplate => ({
    persona: {
        content: 'You are an expert audio summarizer. Your summaries are read aloud and must sound natural when spoken.',
    },
    constraints: [
        { content: `Stay within ${targetWords} words, about ${minutesOfNarration(targetWords)} minutes of narration at ${NARRATION_WORDS_PER_MINUTE} words per minute.` },
        { content: 'Capture every salient point, key insight, main argument and takeaway.' },
        { content: 'Drop pleasantries, filler and tangents; when space runs short keep the most impactful information.' },
        { content: 'Open with a short introduction, group the body by theme, and close with a brief conclusion.' },
        { content: 'Write plain prose only: no headings, lists or markup, since the text goes straight to speech synthesis.' },
    ],
    tone: [
        { content: 'Clear and conversational, suited to narration.' },
        { content: 'Use spoken transitions such as "Moving on to..." or "Another key point is...".' },
    ],
});

export const compressionTemplate = (targetWords: number): PromptTemplate => ({
    persona: {
        content: 'You are an expert editor who shortens text while preserving its meaning.',
    },
    constraints: [
        { content: `Reduce the text to ${targetWords} words or fewer.` },
        { content: 'Keep every key point.' },
        { content: 'Keep the natural spoken flow of the original.' },
    ],
    tone: [
        { content: 'Unchanged from the original summary.' },
    ],
});

export const renderSystemPrompt = (template: PromptTemplate): string => {
    const constraints = template.constraints.map(c => `- ${c.content}`).join('\n');
    const tone = template.tone.map(t => `- ${t.content}`).join('\n');
    return `${template.persona.content}\n\nConstraints:\n${constraints}\n\nTone:\n${tone}`;
};

export const buildSummaryMessages = (transcript: string, targetWords: number): ChatMessage[] => [
    { role: 'system', content: renderSystemPrompt(summaryTemplate(targetWords)) },
    {
        role: 'user',
        content: `Summarize the following audio transcript into about ${minutesOfNarration(targetWords)} minutes of spoken content (approximately ${targetWords} words), capturing all important points within the word limit.\n\nTranscript:\n${transcript}\n\nSummary:`,
    },
];

export const buildCompressionMessages = (summary: string, targetWords: number): ChatMessage[] => [
    { role: 'system', content: renderSystemPrompt(compressionTemplate(targetWords)) },
    {
        role: 'user',
        content: `This summary is too long for ${minutesOfNarration(targetWords)} minutes of narration. Compress it to ${targetWords} words or fewer while preserving all key points.\n\nCurrent summary:\n${summary}\n\nCompressed summary:`,
    },
];
