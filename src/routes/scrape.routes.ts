import { Router, type Request, type Response, type NextFunction } from 'express';
import type { ScrapeService } from '../services/ScrapeService';
import { scrapeRequestSchema, scrapeSchemas, validate } from '../middlewares/validation.middleware';
import type { ScrapeRequest, ScrapeResponse } from '../types';
import { logger } from '../utils/logger';

/** Failed sync scrapes answer 404 when the source was missing, 502 otherwise. */
export const statusForFailedScrape = (response: ScrapeResponse): number =>
  response.errors.some((error) => error.code === 'NOT_FOUND') ? 404 : 502;

export const createScrapeRouter = (scrapeService: ScrapeService): Router => {
  const scrapeRouter = Router();

  /**
   * @route   POST /api/v1/scrape
   * @desc    Scrape Reddit inline, or queue a background job when a webhookUrl is given
   * @access  Public
   */
  scrapeRouter.post(
    '/scrape',
    validate(scrapeSchemas.scrape),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const request: ScrapeRequest = req.body;
        const submitted = await scrapeService.submit(request);

        if (submitted.mode === 'async') {
          const { job } = submitted;
          res.status(202).json({
            success: true,
            message: '✅ Scrape job queued, results will be delivered to the webhook',
            jobId: job.id,
            status: job.status,
            statusUrl: `${req.baseUrl}/jobs/${job.id}`,
            webhookUrl: request.webhookUrl,
          });
          return;
        }

        const { response } = submitted;
        if (!response.success) {
          res.status(statusForFailedScrape(response)).json(response);
          return;
        }

        if (response.formattedData) {
          res.type(response.formattedData.contentType).send(response.formattedData.data);
          return;
        }

        res.json(response);
      } catch (error) {
        logger.error('❌ Error handling scrape request:', error);
        next(error);
      }
    },
  );

  /**
   * @route   GET /api/v1/subreddit/:name
   * @desc    Quick listing of a subreddit's posts (sync)
   * @access  Public
   */
  scrapeRouter.get('/subreddit/:name', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = scrapeSchemas.subredditParams.parse(req.params);
      const { limit, sort } = scrapeSchemas.subredditQuery.parse(req.query);

      const request: ScrapeRequest = scrapeRequestSchema.parse({
        startUrls: [`https://www.reddit.com/r/${name}`],
        searchForComments: false,
        sortSearch: sort,
        maxItems: limit,
        postsPerPage: Math.min(limit, 100),
      });
      const response = await scrapeService.runSync(request);

      if (!response.success) {
        res.status(statusForFailedScrape(response)).json(response);
        return;
      }

      res.json({
        success: true,
        subreddit: name,
        posts: response.data.posts,
        count: response.data.posts.length,
        scrapedAt: response.metadata.scrapedAt,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @route   POST /api/v1/webhooks/test
   * @desc    Send a one-off test payload to a webhook URL
   * @access  Public
   */
  scrapeRouter.post(
    '/webhooks/test',
    validate(scrapeSchemas.webhookTest),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { url }: { url: string } = req.body;
        const result = await scrapeService.testWebhook(url);
        res.status(result.success ? 200 : 502).json({ success: result.success, data: result });
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * @route   GET /api/v1/gateway
   * @desc    Reddit gateway and proxy configuration
   * @access  Public
   */
  scrapeRouter.get('/gateway', (_req: Request, res: Response) => {
    res.json({ success: true, data: scrapeService.describeGateway() });
  });

  return scrapeRouter;
};
