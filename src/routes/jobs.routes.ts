import { Router, type Request, type Response, type NextFunction } from 'express';
import type { ScrapeService } from '../services/ScrapeService';
import { scrapeSchemas, validate } from '../middlewares/validation.middleware';

export const createJobsRouter = (scrapeService: ScrapeService): Router => {
  const jobsRouter = Router();

  /**
   * @route   GET /api/v1/jobs
   * @desc    List jobs, newest first, optionally filtered by status
   * @access  Public
   */
  jobsRouter.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { status, limit } = scrapeSchemas.listJobsQuery.parse(req.query);
      const jobs = await scrapeService.listJobs({ status, limit });

      res.json({
        success: true,
        count: jobs.length,
        data: jobs.map((job) => ({
          id: job.id,
          status: job.status,
          createdAt: job.createdAt,
          startedAt: job.startedAt,
          finishedAt: job.finishedAt,
          progress: job.progress,
          itemsReturned: job.result?.itemsReturned ?? 0,
          errorCount: job.errors.length,
          cancelRequested: job.cancelRequested,
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @route   GET /api/v1/jobs/summary
   * @desc    Counts per status, active jobs, delivery and timing stats
   * @access  Public
   */
  jobsRouter.get('/summary', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = await scrapeService.getSummary();
      res.json({ success: true, data: summary });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @route   GET /api/v1/jobs/:id
   * @desc    Job status, progress, errors and webhook delivery record
   * @access  Public
   */
  jobsRouter.get('/:id', validate(scrapeSchemas.jobId), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = await scrapeService.getJob(req.params.id);
      res.json({ success: true, data: job });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @route   GET /api/v1/jobs/:id/result
   * @desc    Result envelope (json) or rendered document of a finished job
   * @access  Public
   */
  jobsRouter.get(
    '/:id/result',
    validate(scrapeSchemas.jobId),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { format } = scrapeSchemas.resultQuery.parse(req.query);

        if (!format) {
          res.json(await scrapeService.getJobResponse(req.params.id));
          return;
        }

        const rendered = await scrapeService.renderJobResult(req.params.id, format);
        res.setHeader('Content-Disposition', `inline; filename="${rendered.fileName}"`);
        res.type(rendered.contentType).send(rendered.body);
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * @route   POST /api/v1/jobs/:id/cancel
   * @desc    Cancel a queued or running job
   * @access  Public
   */
  jobsRouter.post(
    '/:id/cancel',
    validate(scrapeSchemas.jobId),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const job = await scrapeService.cancelJob(req.params.id);
        res.status(202).json({
          success: true,
          message: job.status === 'CANCELLED' ? '🚫 Job cancelled' : '🚫 Cancellation requested',
          data: { id: job.id, status: job.status, cancelRequested: job.cancelRequested },
        });
      } catch (error) {
        next(error);
      }
    },
  );

  return jobsRouter;
};
