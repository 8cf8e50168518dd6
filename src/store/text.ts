import { DEFAULT_TITLE_WORDS, UNTITLED_INSIGHT } from '../constants';

export const generateTitle = (text: string, maxWords: number = DEFAULT_TITLE_WORDS): string => {
    const words = text.split(/\s+/).filter((word) => word.length > 0);
    if (words.length === 0) {
        return UNTITLED_INSIGHT;
    }
    const head = words.slice(0, maxWords).join(' ');
    return words.length > maxWords ? `${head}...` : head;
};

/**
 * Hashtag-style tags (`#garden` gives `garden`) across all texts, in order
 * of first appearance and without duplicates.
 */
export const extractTags = (...texts: string[]): string[] => uniqueTags(
    texts.flatMap((text) => [...text.matchAll(/#(\w+)/g)].map((match) => match[1])),
);

/** Tags are single tokens: inner whitespace becomes a hyphen. */
export const uniqueTags = (tags: readonly string[]): string[] => {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const raw of tags) {
        const tag = raw.trim().replace(/^#/, '').replace(/\s+/g, '-');
        if (tag && !seen.has(tag)) {
            seen.add(tag);
            out.push(tag);
        }
    }
    return out;
};
