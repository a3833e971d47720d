#!/usr/bin/env node
import fs from 'fs';
import os from 'os';
import { Server } from 'http';
import logger from './utils/logger';
import { ConfigLoader } from './utils/configLoader';
import { parseCliArgs } from './utils/cliArgs';
import { CleanupManager } from './utils/cleanupManager';
import { describeError } from './utils/errors';
import { CatalogStore } from './services/catalogStore';
import { CatalogSync } from './services/catalogSync';
import { MirrorFetcher } from './services/mirrorFetcher';
import { createApp } from './app';

function findServerIp(): string {
    const interfaces = os.networkInterfaces();
    for (const name of Object.keys(interfaces)) {
        for (const iface of interfaces[name] ?? []) {
            if (iface.family === 'IPv4' && !iface.internal) {
                return iface.address;
            }
        }
    }
    return 'localhost';
}

async function main(): Promise<void> {
    const cliOptions = parseCliArgs(process.argv.slice(2));

    // Load configuration
    const configLoader = ConfigLoader.getInstance();
    if (cliOptions.port !== undefined) {
        configLoader.overridePort(cliOptions.port);
    }
    const serverConfig = configLoader.getServerConfig();
    const storageConfig = configLoader.getStorageConfig();
    const mirrorConfig = configLoader.getMirrorConfig();
    const cleanupConfig = configLoader.getCleanupConfig();

    const videosRoot = storageConfig.videosPath;

    // Ensure storage directory exists
    if (!fs.existsSync(videosRoot)) {
        fs.mkdirSync(videosRoot, { recursive: true });
    }

    const store = CatalogStore.open(storageConfig.catalogPath, logger);
    await new CatalogSync(store, videosRoot, logger).run();

    const mirrorFetcher = new MirrorFetcher(store, videosRoot, {
        requestTimeoutMs: mirrorConfig.requestTimeoutMs,
        loggerInstance: logger,
    });

    const cleanupManager = new CleanupManager(videosRoot, {
        isEnabled: cleanupConfig.enabled,
        staleAfterMs: cleanupConfig.staleAfterMinutes * 60 * 1000,
        cleanupIntervalMs: cleanupConfig.intervalMinutes * 60 * 1000,
        loggerInstance: logger,
    });

    const app = createApp({ store, mirrorFetcher, videosRoot, logger });

    const server: Server = app.listen(serverConfig.port, serverConfig.host, () => {
        logger.info(`Playlist mirror listening on port ${serverConfig.port}`);
        logger.info(`Serving ${videosRoot}, catalog at ${storageConfig.catalogPath}`);
        logger.info(`Server is accessible from: http://${findServerIp()}:${serverConfig.port}`);
        cleanupManager.start();
    });

    const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}, shutting down server...`);
        cleanupManager.stop();
        server.close(() => {
            store.close();
            process.exit(0);
        });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    logger.error(`Startup failed: ${describeError(error)}`);
    process.exitCode = 1;
});
