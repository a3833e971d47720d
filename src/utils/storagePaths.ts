import path from 'path';

export const PLAYLIST_EXTENSION = '.m3u8';
export const STAGING_PREFIX = '.staging-';

/**
 * Catalog paths are slash-separated and start with the storage root's own
 * directory name, e.g. `videos/show/show.m3u8` for a root of `/srv/videos`.
 */
export function toCatalogPath(videosRoot: string, filePath: string): string {
    const relative = path.relative(videosRoot, filePath).split(path.sep).join('/');
    return `${path.basename(videosRoot)}/${relative}`;
}

export function stripStoragePrefix(videosRoot: string, catalogPath: string): string {
    const prefix = `${path.basename(videosRoot)}/`;
    return catalogPath.startsWith(prefix) ? catalogPath.slice(prefix.length) : catalogPath;
}

export function titleFromFilename(filename: string): string {
    return filename.toLowerCase().endsWith(PLAYLIST_EXTENSION)
        ? filename.slice(0, -PLAYLIST_EXTENSION.length)
        : filename;
}

export function isPlaylistFile(filename: string): boolean {
    return path.extname(filename).toLowerCase() === PLAYLIST_EXTENSION;
}
