export interface CatalogEntry {
    title: string;
    path: string;
}

export interface SegmentRef {
    uri: string;
    duration: number;   // From #EXTINF
    title?: string;
    lineNumber: number; // 1-based line of the URI in the source document
}

export interface VariantRef {
    uri: string;
    attributes: string;
    lineNumber: number;
}

export interface MediaPlaylist {
    kind: 'media';
    version?: number;
    targetDuration?: number;
    mediaSequence: number;
    endList: boolean;
    segments: SegmentRef[];
}

export interface MasterPlaylist {
    kind: 'master';
    version?: number;
    variants: VariantRef[];
    segments: SegmentRef[]; // always empty
}

export type ParsedPlaylist = MediaPlaylist | MasterPlaylist;

export type MirrorOutcome = 'mirrored' | 'unsupported-kind';

export interface MirrorResult {
    title: string;
    playlistPath: string; // Catalog path of the stored playlist
    outcome: MirrorOutcome;
    segmentCount: number;
}

export interface CatalogSyncSummary {
    added: number;
    skipped: number;
}
