import { ParsedPlaylist, SegmentRef, VariantRef } from '../types';
import logger from './logger';

const MASTER_TAGS = ['#EXT-X-STREAM-INF:', '#EXT-X-I-FRAME-STREAM-INF:', '#EXT-X-MEDIA:'];
const MEDIA_TAGS = ['#EXTINF:', '#EXT-X-TARGETDURATION:', '#EXT-X-MEDIA-SEQUENCE:', '#EXT-X-ENDLIST'];

const INTEGER_PATTERN = /^\d+$/;
const DURATION_PATTERN = /^\d+(\.\d+)?$/;

export class PlaylistParseError extends Error {
    public readonly lineNumber: number;

    constructor(message: string, lineNumber: number) {
        super(`Line ${lineNumber}: ${message}`);
        this.name = 'PlaylistParseError';
        this.lineNumber = lineNumber;
    }
}

function parseInteger(tag: string, value: string, lineNumber: number): number {
    if (!INTEGER_PATTERN.test(value)) {
        throw new PlaylistParseError(`${tag} expects a decimal integer, got "${value}"`, lineNumber);
    }
    return parseInt(value, 10);
}

function tagValue(line: string): string {
    return line.slice(line.indexOf(':') + 1).trim();
}

// Whitespace is not allowed inside a URI line, and it has to resolve as a URL.
function isUsableUri(uri: string): boolean {
    if (!uri || /\s/.test(uri)) {
        return false;
    }
    try {
        new URL(uri, 'http://playlist.invalid/');
        return true;
    } catch {
        return false;
    }
}

/**
 * Parses an HLS playlist.
 *
 * Media playlists yield their segments in document order. Master playlists
 * yield no segments; their variant URIs are reported for information only.
 * Throws {@link PlaylistParseError} when the document is not a valid playlist.
 */
export function parseM3u8(content: string): ParsedPlaylist {
    const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);

    const firstIndex = lines.findIndex(line => line.trim() !== '');
    if (firstIndex === -1) {
        throw new PlaylistParseError('Empty playlist', 1);
    }
    if (lines[firstIndex].trim() !== '#EXTM3U') {
        throw new PlaylistParseError('Missing #EXTM3U header', firstIndex + 1);
    }

    const segments: SegmentRef[] = [];
    const variants: VariantRef[] = [];
    let version: number | undefined;
    let targetDuration: number | undefined;
    let mediaSequence = 0;
    let endList = false;
    let sawMasterTag = false;
    let sawMediaTag = false;

    let pendingSegment: { duration: number; title?: string } | undefined;
    let pendingVariant: string | undefined;

    for (let i = firstIndex + 1; i < lines.length; i++) {
        const line = lines[i].trim();
        const lineNumber = i + 1;

        if (!line) {
            continue;
        }

        if (line.startsWith('#')) {
            if (MASTER_TAGS.some(tag => line.startsWith(tag))) {
                sawMasterTag = true;
            }
            if (MEDIA_TAGS.some(tag => line.startsWith(tag))) {
                sawMediaTag = true;
            }
            if (sawMasterTag && sawMediaTag) {
                throw new PlaylistParseError('Playlist mixes master and media tags', lineNumber);
            }

            if (line.startsWith('#EXT-X-VERSION:')) {
                version = parseInteger('#EXT-X-VERSION', tagValue(line), lineNumber);
            } else if (line.startsWith('#EXT-X-TARGETDURATION:')) {
                targetDuration = parseInteger('#EXT-X-TARGETDURATION', tagValue(line), lineNumber);
            } else if (line.startsWith('#EXT-X-MEDIA-SEQUENCE:')) {
                mediaSequence = parseInteger('#EXT-X-MEDIA-SEQUENCE', tagValue(line), lineNumber);
            } else if (line === '#EXT-X-ENDLIST') {
                endList = true;
            } else if (line.startsWith('#EXTINF:')) {
                const value = tagValue(line);
                const commaIndex = value.indexOf(',');
                const durationText = (commaIndex === -1 ? value : value.slice(0, commaIndex)).trim();
                if (!DURATION_PATTERN.test(durationText)) {
                    throw new PlaylistParseError(`#EXTINF expects a duration, got "${durationText}"`, lineNumber);
                }
                if (pendingSegment) {
                    logger.debug(`Skipping #EXTINF without a URI before line ${lineNumber}`);
                }
                const title = commaIndex === -1 ? '' : value.slice(commaIndex + 1).trim();
                pendingSegment = { duration: parseFloat(durationText), ...(title ? { title } : {}) };
            } else if (line.startsWith('#EXT-X-STREAM-INF:')) {
                pendingVariant = tagValue(line);
            }
            continue;
        }

        // URI line
        if (pendingVariant !== undefined) {
            variants.push({ uri: line, attributes: pendingVariant, lineNumber });
            pendingVariant = undefined;
        } else if (pendingSegment) {
            if (isUsableUri(line)) {
                segments.push({ uri: line, ...pendingSegment, lineNumber });
            } else {
                logger.debug(`Skipping malformed segment URI on line ${lineNumber}`);
            }
            pendingSegment = undefined;
        } else {
            logger.debug(`Ignoring URI without #EXTINF on line ${lineNumber}`);
        }
    }

    if (sawMasterTag) {
        logger.debug(`Parsed master playlist with ${variants.length} variant(s)`);
        return { kind: 'master', version, variants, segments: [] };
    }

    logger.debug(`Parsed media playlist with ${segments.length} segment(s)`);
    return { kind: 'media', version, targetDuration, mediaSequence, endList, segments };
}
