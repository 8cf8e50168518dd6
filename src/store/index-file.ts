/**
 * index.md rendering and parsing
 *
 * One line per insight, newest first:
 *
 *   - [Title](./insights/<id>.md) — 2024-03-15 14:22:33 #tag #other
 *
 * The file is always rendered whole from a list of entries, so an upsert and
 * a full rebuild over the same records produce identical bytes.
 */

import { INDEX_HEADER, INSIGHTS_SUBDIRECTORY } from '../constants';
import { IndexEntry, Insight } from './types';

const ENTRY_PATTERN = new RegExp(
    `^- \\[((?:\\\\.|[^\\]\\\\])*)\\]\\(\\./${INSIGHTS_SUBDIRECTORY}/([A-Za-z0-9_-]+)\\.md\\) — (\\d{4}-\\d{2}-\\d{2} \\d{2}:\\d{2}:\\d{2})(.*)$`,
);

const pad = (value: number): string => String(value).padStart(2, '0');

export const formatTimestamp = (iso: string): string => {
    const date = new Date(iso);
    if (Number.isNaN(date.getTime())) {
        return '0000-00-00 00:00:00';
    }
    return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
        + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
};

const escapeTitle = (title: string): string => title.replace(/[\\[\]]/g, (char) => `\\${char}`);
const unescapeTitle = (title: string): string => title.replace(/\\(.)/g, '$1');

export const toIndexEntry = (insight: Insight): IndexEntry => ({
    id: insight.id,
    // Line-based format
    title: insight.title.replace(/\s+/g, ' ').trim(),
    timestamp: formatTimestamp(insight.createdAt),
    tags: insight.tags,
});

export const compareEntries = (a: IndexEntry, b: IndexEntry): number => {
    if (a.timestamp !== b.timestamp) {
        return a.timestamp < b.timestamp ? 1 : -1;
    }
    if (a.id === b.id) {
        return 0;
    }
    return a.id < b.id ? 1 : -1;
};

export const renderEntry = (entry: IndexEntry): string => {
    const tags = entry.tags.map((tag) => ` #${tag}`).join('');
    return `- [${escapeTitle(entry.title)}](./${INSIGHTS_SUBDIRECTORY}/${entry.id}.md) — ${entry.timestamp}${tags}`;
};

export const renderIndex = (entries: readonly IndexEntry[]): string => {
    const lines = [...entries].sort(compareEntries).map(renderEntry);
    return `${INDEX_HEADER}\n\n${lines.length > 0 ? `${lines.join('\n')}\n` : ''}`;
};

export const parseEntry = (line: string): IndexEntry | null => {
    const match = ENTRY_PATTERN.exec(line.trim());
    if (!match) {
        return null;
    }
    const [, title, id, timestamp, rest] = match;
    // Tags are whitespace-separated `#token`s, as renderEntry writes them
    const tags = rest.split(/\s+/)
        .filter((token) => token.length > 1 && token.startsWith('#'))
        .map((token) => token.slice(1));
    return { id, title: unescapeTitle(title), timestamp, tags };
};

/**
 * Lines that are not entries (the header, blank lines, hand-written notes)
 * are skipped.
 */
export const parseIndex = (content: string): IndexEntry[] =>
    content.split(/\r?\n/)
        .map(parseEntry)
        .filter((entry): entry is IndexEntry => entry !== null);

export const upsertEntry = (entries: readonly IndexEntry[], entry: IndexEntry): IndexEntry[] =>
    [...entries.filter((existing) => existing.id !== entry.id), entry].sort(compareEntries);
