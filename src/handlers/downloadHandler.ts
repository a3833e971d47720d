import { Request, Response } from 'express';
import { Logger } from 'winston';
import logger from '../utils/logger';
import { MirrorFetcher } from '../services/mirrorFetcher';
import { sendError } from '../utils/errors';
import { requireStringField } from './requestBody';

export class DownloadHandler {
    private mirrorFetcher: MirrorFetcher;
    private logger: Logger;

    constructor(mirrorFetcher: MirrorFetcher, loggerInstance?: Logger) {
        this.mirrorFetcher = mirrorFetcher;
        this.logger = loggerInstance || logger;
    }

    /**
     * POST /download: mirrors a remote playlist. The response is sent once the
     * whole job has finished or failed.
     */
    public handlePost = async (req: Request, res: Response): Promise<void> => {
        try {
            const url = requireStringField(req.body, 'url');
            this.logger.info(`Download requested for ${url}`);

            const result = await this.mirrorFetcher.mirror(url);

            const message = result.outcome === 'mirrored'
                ? `Downloaded and saved ${result.title} with ${result.segmentCount} segment(s)`
                : `Saved master playlist ${result.title}; variant streams are not mirrored`;
            res.status(200).type('text/plain').send(message);
        } catch (error) {
            sendError(res, error, this.logger);
        }
    };
}
