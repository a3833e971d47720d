import fs from 'fs';
import path from 'path';
import { Logger } from 'winston';
import logger from '../utils/logger';
import { CatalogStore } from './catalogStore';
import { CatalogSyncSummary } from '../types';
import { STAGING_PREFIX, isPlaylistFile, titleFromFilename, toCatalogPath } from '../utils/storagePaths';

/**
 * Registers every playlist found under the storage root. Runs once before the
 * server starts; a walk or catalog failure rejects and startup is aborted.
 */
export class CatalogSync {
    private store: CatalogStore;
    private videosRoot: string;
    private logger: Logger;

    constructor(store: CatalogStore, videosRoot: string, loggerInstance?: Logger) {
        this.store = store;
        this.videosRoot = videosRoot;
        this.logger = loggerInstance || logger;
    }

    public async run(): Promise<CatalogSyncSummary> {
        const summary: CatalogSyncSummary = { added: 0, skipped: 0 };

        const walk = async (current: string): Promise<void> => {
            const entries = await fs.promises.readdir(current, { withFileTypes: true });
            entries.sort((a, b) => a.name.localeCompare(b.name));

            for (const entry of entries) {
                const fullPath = path.join(current, entry.name);
                if (entry.isDirectory()) {
                    if (entry.name.startsWith(STAGING_PREFIX)) {
                        this.logger.debug(`Skipping staging directory ${fullPath}`);
                        continue;
                    }
                    await walk(fullPath);
                    continue;
                }
                if (!entry.isFile() || !isPlaylistFile(entry.name)) {
                    continue;
                }

                const title = titleFromFilename(entry.name);
                const catalogPath = toCatalogPath(this.videosRoot, fullPath);

                if (this.store.insertIfAbsent(title, catalogPath)) {
                    summary.added++;
                    this.logger.info(`Added ${title} to the catalog (${catalogPath})`);
                } else {
                    summary.skipped++;
                    this.logger.info(`${title} is already in the catalog`);
                }
            }
        };

        this.logger.info(`Scanning ${this.videosRoot} for playlists`);
        await walk(this.videosRoot);
        this.logger.info(`Catalog sync complete: ${summary.added} added, ${summary.skipped} already present`);
        return summary;
    }
}
