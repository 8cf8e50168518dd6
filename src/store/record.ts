/**
 * Insight record format
 *
 * Every field lives in the YAML frontmatter; the Markdown body is a readable
 * rendering of the same data and is ignored when parsing.
 */

import matter from 'gray-matter';
import { z } from 'zod';
import { ID_PATTERN } from '../util/ids';
import { DRAFT_KINDS, Draft, DraftKind, Insight } from './types';

// js-yaml turns unquoted timestamps into Date objects
const IsoDate = z.union([z.string(), z.date()]).transform((value) =>
    value instanceof Date ? value.toISOString() : value,
);

const DraftKindSchema = z.custom<DraftKind>((value) => DRAFT_KINDS.some((kind) => kind === value), {
    message: `Draft kind must be one of ${DRAFT_KINDS.join(', ')}`,
});

const DraftSchema = z.object({
    kind: DraftKindSchema,
    text: z.string(),
    createdAt: IsoDate,
    sectionTitle: z.string().optional(),
});

const InsightSchema = z.object({
    id: z.string().regex(ID_PATTERN),
    createdAt: IsoDate,
    title: z.string(),
    tags: z.array(z.coerce.string()).default([]),
    transcript: z.string(),
    capsule: z.string(),
    drafts: z.array(DraftSchema).default([]),
    sourceAudioPath: z.string().nullable().default(null),
});

const DRAFT_HEADINGS: Record<DraftKind, string> = {
    outline: 'Outline',
    draft: 'First Draft',
    takeaways: 'Key Takeaways',
    expand: 'Expanded Section',
};

const renderDraft = (draft: Draft): string => {
    const heading = draft.kind === 'expand' && draft.sectionTitle
        ? `${DRAFT_HEADINGS.expand}: ${draft.sectionTitle}`
        : DRAFT_HEADINGS[draft.kind];
    return `### ${heading} (${draft.createdAt})\n\n${draft.text.trim()}\n`;
};

const renderBody = (insight: Insight): string => {
    const sections = [
        `# ${insight.title}`,
        `**Tags:** ${insight.tags.length > 0 ? insight.tags.map((tag) => `#${tag}`).join(' ') : 'None'}`,
        `## Insight Capsule\n\n${insight.capsule.trim()}`,
        `## Transcript\n\n\`\`\`text\n${insight.transcript.trim()}\n\`\`\``,
    ];
    if (insight.drafts.length > 0) {
        sections.push(`## Drafts\n\n${insight.drafts.map(renderDraft).join('\n')}`);
    }
    return `${sections.join('\n\n')}\n`;
};

export const serializeInsight = (insight: Insight): string => {
    const frontmatter: Record<string, unknown> = {
        id: insight.id,
        createdAt: insight.createdAt,
        title: insight.title,
        tags: insight.tags,
        sourceAudioPath: insight.sourceAudioPath,
        capsule: insight.capsule,
        transcript: insight.transcript,
        drafts: insight.drafts.map((draft) => ({
            kind: draft.kind,
            createdAt: draft.createdAt,
            ...(draft.sectionTitle !== undefined && { sectionTitle: draft.sectionTitle }),
            text: draft.text,
        })),
    };
    return matter.stringify(renderBody(insight), frontmatter);
};

/**
 * Throws a ZodError when the frontmatter does not describe an insight.
 */
export const parseInsight = (content: string): Insight => {
    const { data } = matter(content);
    return InsightSchema.parse(data);
};
