import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import axios from 'axios';
import { Logger } from 'winston';
import logger from '../utils/logger';
import { CatalogStore } from './catalogStore';
import { parseM3u8, PlaylistParseError } from '../utils/m3u8Parser';
import { MirrorResult, ParsedPlaylist, SegmentRef } from '../types';
import {
    ClientInputError,
    FetchError,
    InvalidPlaylistError,
    MirrorInProgressError,
    describeError,
} from '../utils/errors';
import { STAGING_PREFIX, titleFromFilename, toCatalogPath } from '../utils/storagePaths';

export interface MirrorFetcherOptions {
    requestTimeoutMs?: number;
    loggerInstance?: Logger;
}

interface MirrorTarget {
    url: URL;
    filename: string;
    title: string;
}

const HAS_SCHEME = /^[a-z][a-z\d+.-]*:/i;

function safeDecode(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        return value;
    }
}

/**
 * Where a segment is stored inside the job directory. Relative URIs keep
 * their own path when it stays inside the directory; anything else falls
 * back to the basename of the resolved URL.
 */
export function localSegmentPath(uri: string, resolved: URL, index: number): string {
    if (!HAS_SCHEME.test(uri) && !uri.startsWith('/')) {
        const withoutQuery = uri.split(/[?#]/)[0];
        const normalized = path.posix.normalize(safeDecode(withoutQuery));
        if (
            withoutQuery === uri &&
            normalized !== '.' &&
            !normalized.startsWith('../') &&
            normalized !== '..' &&
            !path.posix.isAbsolute(normalized) &&
            !normalized.includes('\\') &&
            !normalized.includes('\0')
        ) {
            return normalized;
        }
    }
    const basename = safeDecode(path.posix.basename(resolved.pathname));
    return basename && !basename.includes('\\') && !basename.includes('\0') && basename !== '..'
        ? basename
        : `segment-${index}.ts`;
}

/**
 * Reserves `candidate` in `taken`, appending `-1`, `-2`, ... before the
 * extension until the name is free.
 */
export function claimLocalPath(candidate: string, taken: Set<string>): string {
    const extension = path.posix.extname(candidate);
    const stem = candidate.slice(0, candidate.length - extension.length);
    let name = candidate;
    for (let suffix = 1; taken.has(name); suffix++) {
        name = `${stem}-${suffix}${extension}`;
    }
    taken.add(name);
    return name;
}

/** The URI a stored playlist uses to reference a local file. */
export function toPlaylistUri(localPath: string): string {
    return localPath.split('/').map(encodeURIComponent).join('/');
}

export class MirrorFetcher {
    private store: CatalogStore;
    private videosRoot: string;
    private requestTimeoutMs: number;
    private logger: Logger;
    private jobsInFlight = new Set<string>();

    constructor(store: CatalogStore, videosRoot: string, options: MirrorFetcherOptions = {}) {
        this.store = store;
        this.videosRoot = videosRoot;
        this.requestTimeoutMs = options.requestTimeoutMs ?? 30000;
        this.logger = options.loggerInstance || logger;
    }

    public isInFlight(title: string): boolean {
        return this.jobsInFlight.has(title);
    }

    private resolveTarget(remoteUrl: string): MirrorTarget {
        let url: URL;
        try {
            url = new URL(remoteUrl);
        } catch {
            throw new ClientInputError(`Invalid playlist URL: ${remoteUrl}`);
        }
        if (url.protocol !== 'http:' && url.protocol !== 'https:') {
            throw new ClientInputError(`Unsupported URL scheme: ${url.protocol}`);
        }

        const filename = safeDecode(path.posix.basename(url.pathname));
        const title = titleFromFilename(filename);
        if (!title || title.startsWith('.') || /[/\\\0]/.test(filename)) {
            throw new ClientInputError(`Cannot derive a title from ${remoteUrl}`);
        }
        return { url, filename, title };
    }

    /**
     * Mirrors a remote playlist and its segments into `<root>/<title>/`.
     *
     * Files are staged in a private directory and moved into place only when
     * every download succeeded; the title is cataloged after the move.
     */
    public mirror = async (remoteUrl: string): Promise<MirrorResult> => {
        const target = this.resolveTarget(remoteUrl);
        const { title } = target;

        if (this.jobsInFlight.has(title)) {
            throw new MirrorInProgressError(title);
        }
        this.jobsInFlight.add(title);

        let stagingDir: string | undefined;
        try {
            await fs.promises.mkdir(this.videosRoot, { recursive: true });
            stagingDir = await fs.promises.mkdtemp(path.join(this.videosRoot, `${STAGING_PREFIX}${title}-`));
            this.logger.info(`[${title}] Mirroring ${target.url.href}`);

            const result = await this.stageAndCommit(target, stagingDir);
            stagingDir = undefined;
            return result;
        } finally {
            this.jobsInFlight.delete(title);
            if (stagingDir) {
                await this.discardStaging(title, stagingDir);
            }
        }
    };

    private async stageAndCommit(target: MirrorTarget, stagingDir: string): Promise<MirrorResult> {
        const { url, filename, title } = target;

        const playlistBytes = await this.fetchPlaylist(url);
        const stagedPlaylist = path.join(stagingDir, filename);
        await this.writeFile(stagedPlaylist, playlistBytes);

        let playlist: ParsedPlaylist;
        try {
            playlist = parseM3u8(playlistBytes.toString('utf-8'));
        } catch (error) {
            if (error instanceof PlaylistParseError) {
                throw new InvalidPlaylistError(`${url.href} is not a valid playlist: ${error.message}`, { cause: error });
            }
            throw error;
        }

        if (playlist.kind === 'master') {
            this.logger.warn(
                `[${title}] ${url.href} is a master playlist with ${playlist.variants.length} variant(s); only the playlist is stored`
            );
        } else {
            const localNames = await this.downloadSegments(title, url, playlist.segments, stagingDir, filename);
            const rewritten = this.rewriteSegmentUris(playlistBytes.toString('utf-8'), playlist.segments, localNames);
            if (rewritten !== undefined) {
                await this.writeFile(stagedPlaylist, Buffer.from(rewritten, 'utf-8'));
                this.logger.debug(`[${title}] Rewrote segment URIs in ${filename} to local names`);
            }
        }

        const jobDir = path.join(this.videosRoot, title);
        await this.commit(title, stagingDir, jobDir);

        const playlistPath = toCatalogPath(this.videosRoot, path.join(jobDir, filename));
        if (this.store.insertIfAbsent(title, playlistPath)) {
            this.logger.info(`Added ${title} to the catalog (${playlistPath})`);
        } else {
            this.logger.info(`${title} is already in the catalog`);
        }

        const segmentCount = playlist.segments.length;
        this.logger.info(`[${title}] Mirror complete: playlist and ${segmentCount} segment(s) saved to ${jobDir}`);
        return {
            title,
            playlistPath,
            outcome: playlist.kind === 'media' ? 'mirrored' : 'unsupported-kind',
            segmentCount,
        };
    }

    private async fetchPlaylist(url: URL): Promise<Buffer> {
        try {
            this.logger.debug(`Fetching playlist from URL: ${url.href}`);
            const response = await axios.get<ArrayBuffer>(url.href, {
                responseType: 'arraybuffer',
                timeout: this.requestTimeoutMs,
            });
            const bytes = Buffer.from(response.data);
            this.logger.debug(`Playlist response status: ${response.status}, ${bytes.length} bytes`);
            return bytes;
        } catch (error) {
            throw new FetchError(`Failed to download playlist ${url.href}: ${describeError(error)}`, { cause: error });
        }
    }

    private async downloadSegments(
        title: string,
        playlistUrl: URL,
        segments: SegmentRef[],
        stagingDir: string,
        playlistFilename: string
    ): Promise<string[]> {
        const localNames: string[] = [];
        const taken = new Set<string>([playlistFilename]);

        // One segment at a time, in playback order.
        for (const [index, segment] of segments.entries()) {
            const segmentUrl = new URL(segment.uri, playlistUrl);
            const localName = claimLocalPath(localSegmentPath(segment.uri, segmentUrl, index), taken);
            const destination = path.join(stagingDir, localName);

            try {
                await fs.promises.mkdir(path.dirname(destination), { recursive: true });
                const response = await axios.get<Readable>(segmentUrl.href, {
                    responseType: 'stream',
                    timeout: this.requestTimeoutMs,
                });
                await pipeline(response.data, fs.createWriteStream(destination));
            } catch (error) {
                throw new FetchError(`Failed to download segment ${segmentUrl.href}: ${describeError(error)}`, { cause: error });
            }

            localNames.push(localName);
            this.logger.debug(`[${title}] Segment ${index + 1}/${segments.length} saved as ${localName}`);
        }

        return localNames;
    }

    // Returns undefined when every URI already references its local file.
    private rewriteSegmentUris(content: string, segments: SegmentRef[], localNames: string[]): string | undefined {
        const localUris = localNames.map(toPlaylistUri);
        if (segments.every((segment, index) => segment.uri === localUris[index])) {
            return undefined;
        }
        const eol = content.includes('\r\n') ? '\r\n' : '\n';
        const lines = content.split(/\r?\n/);
        segments.forEach((segment, index) => {
            const lineIndex = segment.lineNumber - 1;
            lines[lineIndex] = lines[lineIndex].replace(segment.uri, () => localUris[index]);
        });
        return lines.join(eol);
    }

    private async writeFile(filePath: string, data: Buffer): Promise<void> {
        try {
            await fs.promises.writeFile(filePath, data);
        } catch (error) {
            throw new FetchError(`Failed to write ${filePath}: ${describeError(error)}`, { cause: error });
        }
    }

    private async listFiles(dir: string, prefix = ''): Promise<string[]> {
        const entries = await fs.promises.readdir(path.join(dir, prefix), { withFileTypes: true });
        const files: string[] = [];
        for (const entry of entries) {
            const relative = path.join(prefix, entry.name);
            if (entry.isDirectory()) {
                files.push(...(await this.listFiles(dir, relative)));
            } else {
                files.push(relative);
            }
        }
        return files;
    }

    private async commit(title: string, stagingDir: string, jobDir: string): Promise<void> {
        try {
            const files = await this.listFiles(stagingDir);
            for (const relative of files) {
                const destination = path.join(jobDir, relative);
                await fs.promises.mkdir(path.dirname(destination), { recursive: true });
                await fs.promises.rename(path.join(stagingDir, relative), destination);
            }
            await fs.promises.rm(stagingDir, { recursive: true, force: true });
            this.logger.debug(`[${title}] Moved ${files.length} file(s) into ${jobDir}`);
        } catch (error) {
            throw new FetchError(`Failed to move mirrored files into ${jobDir}: ${describeError(error)}`, { cause: error });
        }
    }

    private async discardStaging(title: string, stagingDir: string): Promise<void> {
        try {
            await fs.promises.rm(stagingDir, { recursive: true, force: true });
            this.logger.debug(`[${title}] Removed staging directory ${stagingDir}`);
        } catch (error) {
            this.logger.error(`[${title}] Failed to remove staging directory ${stagingDir}: ${describeError(error)}`);
        }
    }
}
