import express, { Express, Request, Response, NextFunction } from 'express';
import { Logger } from 'winston';
import { CatalogStore } from './services/catalogStore';
import { MirrorFetcher } from './services/mirrorFetcher';
import { VideoHandler } from './handlers/videoHandler';
import { DownloadHandler } from './handlers/downloadHandler';
import { ClientInputError, NotFoundError, sendError } from './utils/errors';

export interface AppDependencies {
    store: CatalogStore;
    mirrorFetcher: MirrorFetcher;
    videosRoot: string;
    logger: Logger;
}

const CONTENT_TYPES: Record<string, string> = {
    '.m3u8': 'application/vnd.apple.mpegurl',
    '.ts': 'video/mp2t',
};

export function allowAnyOrigin(req: Request, res: Response, next: NextFunction): void {
    res.setHeader('Access-Control-Allow-Origin', '*');
    next();
}

const isBodyParseError = (err: unknown): boolean =>
    err instanceof SyntaxError && 'status' in err && err.status === 400;

export function createApp({ store, mirrorFetcher, videosRoot, logger }: AppDependencies): Express {
    const videoHandler = new VideoHandler(store, videosRoot, logger);
    const downloadHandler = new DownloadHandler(mirrorFetcher, logger);

    const app = express();

    app.use(allowAnyOrigin);

    // Log all requests
    app.use((req: Request, res: Response, next: NextFunction) => {
        logger.http(`[${req.method}] ${req.originalUrl}`);
        logger.debug(`Request headers: ${JSON.stringify(req.headers)}`);
        next();
    });

    // POST bodies are JSON whatever Content-Type the client sends.
    app.use(express.json({ type: () => true }));

    app.post('/video', videoHandler.handleLookup);

    app.post('/download', (req: Request, res: Response, next: NextFunction) => {
        downloadHandler.handlePost(req, res).catch(next);
    });

    app.get('/videos', videoHandler.handleList);

    // Everything else is served from the storage root.
    app.use(express.static(videosRoot, {
        dotfiles: 'ignore',
        setHeaders: (res, filePath) => {
            const extension = filePath.slice(filePath.lastIndexOf('.')).toLowerCase();
            const contentType = CONTENT_TYPES[extension];
            if (contentType) {
                res.setHeader('Content-Type', contentType);
            }
        },
    }));

    app.use((req: Request, res: Response) => {
        sendError(res, new NotFoundError(`File not found: ${req.path}`), logger);
    });

    // Error handler
    app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
        if (isBodyParseError(err)) {
            sendError(res, new ClientInputError('Malformed JSON body'), logger);
            return;
        }
        sendError(res, err, logger);
    });

    return app;
}
