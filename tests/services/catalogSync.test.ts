import fs from 'fs';
import os from 'os';
import path from 'path';
import winston from 'winston';
import { CatalogStore } from '../../src/services/catalogStore';
import { CatalogSync } from '../../src/services/catalogSync';

const silentLogger = winston.createLogger({ silent: true });

describe('Catalog Sync', () => {
    let workDir: string;
    let videosRoot: string;
    let store: CatalogStore;

    const writeFile = (relative: string, content = '#EXTM3U\n'): void => {
        const filePath = path.join(videosRoot, relative);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, content);
    };

    beforeEach(() => {
        workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-sync-'));
        videosRoot = path.join(workDir, 'videos');
        fs.mkdirSync(videosRoot);
        store = CatalogStore.open(':memory:', silentLogger);
    });

    afterEach(() => {
        store.close();
        fs.rmSync(workDir, { recursive: true, force: true });
    });

    it('should register every playlist with a slash-separated storage path', async () => {
        writeFile('index/index.m3u8');
        writeFile('index/seg0.ts', 'segment');
        writeFile('shows/pilot/pilot.M3U8');
        writeFile('notes.txt', 'not a playlist');

        const summary = await new CatalogSync(store, videosRoot, silentLogger).run();

        expect(summary).toEqual({ added: 2, skipped: 0 });
        expect(store.lookup('index')).toBe('videos/index/index.m3u8');
        expect(store.lookup('pilot')).toBe('videos/shows/pilot/pilot.M3U8');
        expect(new Set(store.listTitles())).toEqual(new Set(['index', 'pilot']));
    });

    it('should be idempotent on an unchanged tree', async () => {
        writeFile('index/index.m3u8');
        writeFile('other/other.m3u8');
        const sync = new CatalogSync(store, videosRoot, silentLogger);

        await sync.run();
        const second = await sync.run();

        expect(second).toEqual({ added: 0, skipped: 2 });
        expect(store.listTitles()).toHaveLength(2);
    });

    it('should keep the first path found for a repeated title', async () => {
        writeFile('a/clip.m3u8');
        writeFile('b/clip.m3u8');

        const summary = await new CatalogSync(store, videosRoot, silentLogger).run();

        expect(summary).toEqual({ added: 1, skipped: 1 });
        expect(store.lookup('clip')).toBe('videos/a/clip.m3u8');
    });

    it('should ignore staging directories of unfinished mirrors', async () => {
        writeFile('.staging-index-abc123/index.m3u8');

        const summary = await new CatalogSync(store, videosRoot, silentLogger).run();

        expect(summary).toEqual({ added: 0, skipped: 0 });
        expect(store.exists('index')).toBe(false);
    });

    it('should reject when the storage root cannot be walked', async () => {
        const sync = new CatalogSync(store, path.join(workDir, 'does-not-exist'), silentLogger);

        await expect(sync.run()).rejects.toThrow('ENOENT');
    });
});
