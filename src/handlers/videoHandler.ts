import { Request, Response } from 'express';
import { Logger } from 'winston';
import logger from '../utils/logger';
import { CatalogStore } from '../services/catalogStore';
import { NotFoundError, sendError } from '../utils/errors';
import { stripStoragePrefix } from '../utils/storagePaths';
import { requireStringField } from './requestBody';

export class VideoHandler {
    private store: CatalogStore;
    private videosRoot: string;
    private logger: Logger;

    constructor(store: CatalogStore, videosRoot: string, loggerInstance?: Logger) {
        this.store = store;
        this.videosRoot = videosRoot;
        this.logger = loggerInstance || logger;
    }

    /** POST /video: resolves a title to a playback URL on this server. */
    public handleLookup = (req: Request, res: Response): void => {
        try {
            const title = requireStringField(req.body, 'title');
            const catalogPath = this.store.lookup(title);
            if (catalogPath === undefined) {
                throw new NotFoundError(`Video not found: ${title}`);
            }

            const relativePath = stripStoragePrefix(this.videosRoot, catalogPath);
            const url = `${req.protocol}://${req.get('host')}/${relativePath.split('/').map(encodeURIComponent).join('/')}`;
            this.logger.debug(`Resolved ${title} to ${url}`);
            res.status(200).json({ url });
        } catch (error) {
            sendError(res, error, this.logger);
        }
    };

    /** GET /videos */
    public handleList = (req: Request, res: Response): void => {
        try {
            const titles = this.store.listTitles();
            this.logger.debug(`Listing ${titles.length} cataloged title(s)`);
            res.status(200).json({ titles });
        } catch (error) {
            sendError(res, error, this.logger);
        }
    };
}
