import { Request, Response } from 'express';
import winston from 'winston';
import { DownloadHandler } from '../../src/handlers/downloadHandler';
import { CatalogStore } from '../../src/services/catalogStore';
import { MirrorFetcher } from '../../src/services/mirrorFetcher';
import { FetchError, MirrorInProgressError } from '../../src/utils/errors';

const silentLogger = winston.createLogger({ silent: true });

const createResponse = () => ({
    status: jest.fn().mockReturnThis(),
    type: jest.fn().mockReturnThis(),
    json: jest.fn().mockReturnThis(),
    send: jest.fn().mockReturnThis(),
});

const createRequest = (body: unknown) => ({ body }) as unknown as Request;

describe('Download Handler', () => {
    let store: CatalogStore;
    let fetcher: MirrorFetcher;
    let handler: DownloadHandler;

    beforeEach(() => {
        store = CatalogStore.open(':memory:', silentLogger);
        fetcher = new MirrorFetcher(store, '/srv/videos', { loggerInstance: silentLogger });
        handler = new DownloadHandler(fetcher, silentLogger);
    });

    afterEach(() => {
        store.close();
        jest.restoreAllMocks();
    });

    it('should confirm a completed mirror in plain text', async () => {
        const mirror = jest.spyOn(fetcher, 'mirror').mockResolvedValue({
            title: 'index',
            playlistPath: 'videos/index/index.m3u8',
            outcome: 'mirrored',
            segmentCount: 2,
        });
        const res = createResponse();

        await handler.handlePost(createRequest({ url: 'https://cdn.example/show/index.m3u8' }), res as unknown as Response);

        expect(mirror).toHaveBeenCalledWith('https://cdn.example/show/index.m3u8');
        expect(res.status).toHaveBeenCalledWith(200);
        expect(res.type).toHaveBeenCalledWith('text/plain');
        expect(res.send).toHaveBeenCalledWith('Downloaded and saved index with 2 segment(s)');
    });

    it('should say when only a master playlist was stored', async () => {
        jest.spyOn(fetcher, 'mirror').mockResolvedValue({
            title: 'master',
            playlistPath: 'videos/master/master.m3u8',
            outcome: 'unsupported-kind',
            segmentCount: 0,
        });
        const res = createResponse();

        await handler.handlePost(createRequest({ url: 'https://cdn.example/live/master.m3u8' }), res as unknown as Response);

        expect(res.send).toHaveBeenCalledWith('Saved master playlist master; variant streams are not mirrored');
    });

    it('should answer 400 when the url is missing', async () => {
        const mirror = jest.spyOn(fetcher, 'mirror');
        const res = createResponse();

        await handler.handlePost(createRequest({}), res as unknown as Response);

        expect(res.status).toHaveBeenCalledWith(400);
        expect(res.json).toHaveBeenCalledWith({ error: 'bad_request', message: 'Missing url in request body' });
        expect(mirror).not.toHaveBeenCalled();
    });

    it('should answer 502 with a body when the mirror fails', async () => {
        jest.spyOn(fetcher, 'mirror').mockRejectedValue(
            new FetchError('Failed to download segment https://cdn.example/show/seg1.ts: socket hang up')
        );
        const res = createResponse();

        await handler.handlePost(createRequest({ url: 'https://cdn.example/show/index.m3u8' }), res as unknown as Response);

        expect(res.status).toHaveBeenCalledWith(502);
        expect(res.json).toHaveBeenCalledWith({
            error: 'fetch_failed',
            message: 'Failed to download segment https://cdn.example/show/seg1.ts: socket hang up',
        });
    });

    it('should answer 409 while the same title is being mirrored', async () => {
        jest.spyOn(fetcher, 'mirror').mockRejectedValue(new MirrorInProgressError('index'));
        const res = createResponse();

        await handler.handlePost(createRequest({ url: 'https://cdn.example/show/index.m3u8' }), res as unknown as Response);

        expect(res.status).toHaveBeenCalledWith(409);
        expect(res.json).toHaveBeenCalledWith({
            error: 'mirror_in_progress',
            message: 'A mirror of "index" is already in progress',
        });
    });

    it('should answer 500 for unexpected failures', async () => {
        jest.spyOn(fetcher, 'mirror').mockRejectedValue(new Error('boom'));
        const res = createResponse();

        await handler.handlePost(createRequest({ url: 'https://cdn.example/show/index.m3u8' }), res as unknown as Response);

        expect(res.status).toHaveBeenCalledWith(500);
        expect(res.json).toHaveBeenCalledWith({ error: 'internal_error', message: 'Internal server error' });
    });
});
