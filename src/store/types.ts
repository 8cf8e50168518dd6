/**
 * Insight Store Types
 */

export type DraftKind = 'outline' | 'draft' | 'takeaways' | 'expand';

export const DRAFT_KINDS: readonly DraftKind[] = ['outline', 'draft', 'takeaways', 'expand'];

export interface Draft {
    kind: DraftKind;
    text: string;
    createdAt: string;
    /** Set for `expand` drafts. */
    sectionTitle?: string;
}

export interface Insight {
    id: string;
    /** ISO-8601, UTC */
    createdAt: string;
    title: string;
    tags: string[];
    transcript: string;
    capsule: string;
    drafts: Draft[];
    /** Null when audio retention is off or the audio was never owned by the engine. */
    sourceAudioPath: string | null;
}

export interface IndexEntry {
    id: string;
    title: string;
    /** `YYYY-MM-DD HH:MM:SS`, UTC */
    timestamp: string;
    tags: string[];
}

export interface RawTranscriptData {
    sessionId: string;
    text: string;
    audioPath: string | null;
    reason: string;
    message: string;
    failedAt: string;
}

export interface IndexCheck {
    consistent: boolean;
    entries: number;
}

export interface StoreConfig {
    dataDirectory: string;
}

export interface InsightStoreInstance {
    save(insight: Insight): Promise<string>;
    appendDraft(id: string, draft: Draft): Promise<Insight>;
    load(id: string): Promise<Insight>;
    exists(id: string): Promise<boolean>;
    listRecent(limit: number): Promise<Insight[]>;
    listAll(): Promise<Insight[]>;
    /** Regenerates index.md from the records and returns the number of entries. */
    rebuildIndex(): Promise<number>;
    readIndex(): Promise<IndexEntry[]>;
    /** Rebuilds the index when it no longer matches the records. */
    verifyIndex(): Promise<IndexCheck>;
    writeRawTranscript(data: RawTranscriptData): Promise<string>;
    recordPath(id: string): string;
    indexPath(): string;
}
