/**
 * Prompt Templates
 *
 * One builder per generation role. Roles share the gateway's fallback policy
 * and differ only in the text sent to the model.
 */

import { MAX_CAPSULE_WORDS } from '../constants';
import { GenerationRole } from './types';

export const OUTLINE_POINTS = 5;
export const DRAFT_WORDS = 500;
export const TAKEAWAY_COUNT = 3;
export const EXPAND_WORDS = 200;

const WRITING_PERSONA = 'You are a concise, insightful writing assistant. Create clear, engaging content.';

export const SYSTEM_PROMPTS: Record<GenerationRole, string> = {
    'capsule': WRITING_PERSONA,
    'outline': 'You are a content strategist who turns a single insight into a well-structured article plan.',
    'draft': 'You are a content writer who turns insights into practical, approachable articles.',
    'takeaways': WRITING_PERSONA,
    'expand': 'You are a creative assistant who helps structure and expand ideas clearly.',
    'search-answer': 'You answer questions strictly from the notes you are given and say so when they are not enough.',
};

const quote = (text: string): string => `"""\n${text.trim()}\n"""`;

export const capsulePrompt = (transcript: string, maxWords: number = MAX_CAPSULE_WORDS): string => [
    `Condense the following spoken thought into a high-insight capsule of about ${maxWords} words.`,
    'Capture the core idea and its deeper implications.',
    'Skip conversational openings and closings and state the insight directly.',
    '',
    'Transcript:',
    quote(transcript),
    '',
    'Insight Capsule:',
].join('\n');

export const outlinePrompt = (capsule: string, transcript?: string, points: number = OUTLINE_POINTS): string => {
    const lines: string[] = [];
    if (transcript) {
        lines.push('Original thought:', transcript.trim(), '');
    }
    lines.push(
        'Insight:',
        quote(capsule),
        '',
        `Write a ${points}-point blog post outline built on this insight. Include:`,
        '- a compelling title',
        `- ${points} main sections, each with a one-line description`,
        '- practical, actionable framing suitable for an evergreen guide',
        '',
        'Blog Post Outline:',
    );
    return lines.join('\n');
};

export const draftPrompt = (capsule: string, options: { outline?: string; transcript?: string; words?: number } = {}): string => {
    const words = options.words ?? DRAFT_WORDS;
    const lines: string[] = [];
    if (options.transcript) {
        lines.push('Original thought:', options.transcript.trim(), '');
    }
    if (options.outline) {
        lines.push('Outline to follow:', options.outline.trim(), '');
    }
    lines.push(
        'Insight:',
        quote(capsule),
        '',
        `Write a first draft of about ${words} words based on this insight.`,
    );
    if (options.outline) {
        lines.push('Follow the outline above section by section.');
    }
    lines.push(
        'Keep it conversational and free of jargon, with specific examples where they help.',
        '',
        'First Draft:',
    );
    return lines.join('\n');
};

export const takeawaysPrompt = (capsule: string, count: number = TAKEAWAY_COUNT): string => [
    `List ${count} key takeaways from the following insight as a numbered list.`,
    'Keep each one short and actionable.',
    '',
    'Insight:',
    quote(capsule),
    '',
    'Key Takeaways:',
].join('\n');

export const expandPrompt = (capsule: string, sectionTitle: string, words: number = EXPAND_WORDS): string => [
    `Using the following insight, write about ${words} words for the section "${sectionTitle}".`,
    'Make it practical and engaging.',
    '',
    'Insight:',
    quote(capsule),
    '',
    `${sectionTitle}:`,
].join('\n');

export const searchAnswerPrompt = (query: string, context: string): string => [
    'Answer the question below using only the insights from the personal library that follow.',
    '',
    `Question: ${query}`,
    '',
    'Relevant Insights:',
    context,
    '',
    'Instructions:',
    '- Answer clearly and concisely from the insights above only',
    '- Combine information across insights where relevant',
    '- If the insights are not enough to answer fully, say so',
    '- Never add information that is not present in the insights',
    '',
    'Answer:',
].join('\n');
