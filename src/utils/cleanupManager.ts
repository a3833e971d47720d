import fs from 'fs';
import path from 'path';
import { Logger } from 'winston';
import logger from './logger';
import { STAGING_PREFIX } from './storagePaths';

/**
 * Removes staging directories left behind by mirror jobs that never finished,
 * e.g. when the process was killed mid-download.
 */
export class CleanupManager {
    private videosRoot: string;
    private staleAfterMs: number;
    private cleanupIntervalMs: number;
    private isEnabled: boolean;
    private intervalId: NodeJS.Timeout | null = null;
    private logger: Logger;

    constructor(
        videosRoot: string,
        options: {
            isEnabled?: boolean;
            staleAfterMs?: number;
            cleanupIntervalMs?: number;
            loggerInstance?: Logger;
        } = {}
    ) {
        this.videosRoot = videosRoot;
        this.isEnabled = options.isEnabled ?? false;
        this.staleAfterMs = options.staleAfterMs ?? 3600000;
        this.cleanupIntervalMs = options.cleanupIntervalMs ?? 1800000;
        this.logger = options.loggerInstance || logger;
    }

    public start(): void {
        if (!this.isEnabled) {
            this.logger.info('Staging cleanup is disabled');
            return;
        }

        this.logger.info(`Starting staging cleanup. Stale after: ${this.staleAfterMs / 60000} minutes, Interval: ${this.cleanupIntervalMs / 60000} minutes`);

        this.removeStaleStagingDirs();

        this.intervalId = setInterval(() => this.removeStaleStagingDirs(), this.cleanupIntervalMs);
        this.intervalId.unref();
    }

    public stop(): void {
        if (this.intervalId) {
            clearInterval(this.intervalId);
            this.intervalId = null;
            this.logger.info('Staging cleanup stopped');
        }
    }

    /** Returns the number of directories removed. */
    public removeStaleStagingDirs(now: number = Date.now()): number {
        let totalRemoved = 0;
        try {
            if (!fs.existsSync(this.videosRoot)) {
                return 0;
            }
            const cutoffTime = now - this.staleAfterMs;

            const stagingDirs = fs.readdirSync(this.videosRoot, { withFileTypes: true })
                .filter(entry => entry.isDirectory() && entry.name.startsWith(STAGING_PREFIX));

            for (const entry of stagingDirs) {
                const dirPath = path.join(this.videosRoot, entry.name);
                const stats = fs.statSync(dirPath);

                if (stats.mtimeMs < cutoffTime) {
                    fs.rmSync(dirPath, { recursive: true, force: true });
                    totalRemoved++;
                    this.logger.debug(`Removed stale staging directory: ${dirPath}`);
                }
            }

            if (totalRemoved > 0) {
                this.logger.info(`Cleanup complete. Removed ${totalRemoved} stale staging directories.`);
            } else {
                this.logger.debug('Cleanup complete. Nothing to remove.');
            }
        } catch (error) {
            this.logger.error(`Error during staging cleanup: ${error instanceof Error ? error.message : String(error)}`);
        }
        return totalRemoved;
    }
}
