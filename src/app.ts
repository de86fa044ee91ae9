import express, { type Application, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import { createServer, type Server } from 'http';

// 🧱 Config
import { appConfig } from './config/app.config';
import { closeRedisClient } from './config/redis';
import { createContainer, type AppContainer } from './container';

// 🧰 Middlewares
import { errorHandler, notFoundHandler } from './middlewares/errorHandler.middleware';
import { createRateLimitMiddleware } from './middlewares/rateLimit.middleware';

// 🚏 Routes
import { createScrapeRouter } from './routes/scrape.routes';
import { createJobsRouter } from './routes/jobs.routes';

// 🧾 Utils
import { closeLogger, logger } from './utils/logger';

export class ScrapeApiServer {
  private readonly app: Application;
  private readonly httpServer: Server;
  private shuttingDown = false;

  constructor(private readonly container: AppContainer = createContainer(appConfig)) {
    this.app = express();
    this.httpServer = createServer(this.app);

    this.initializeMiddlewares();
    this.initializeRoutes();
    this.initializeErrorHandling();
  }

  getApp(): Application {
    return this.app;
  }

  /** 🧱 Express & Security Middlewares */
  private initializeMiddlewares(): void {
    const { config } = this.container;

    this.app.use(helmet());
    this.app.use(
      cors({
        origin: config.corsOrigin,
        credentials: true,
      }),
    );

    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(express.urlencoded({ extended: true, limit: '1mb' }));

    this.app.use(compression());
    this.app.use(
      morgan('combined', {
        stream: { write: (message) => logger.info(message.trim()) },
      }),
    );

    this.app.use(createRateLimitMiddleware(config.rateLimit, this.container.redis));

    // Health Check Route
    this.app.get('/health', (_req: Request, res: Response) =>
      res.status(200).json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        workers: {
          running: this.container.pool.isRunning(),
          activeJobs: this.container.pool.getActiveJobIds().length,
        },
      }),
    );
  }

  /** 🚏 Route Initialization */
  private initializeRoutes(): void {
    const apiBase = this.container.config.apiPrefix;
    const { scrapeService } = this.container;

    this.app.use(apiBase, createScrapeRouter(scrapeService));
    this.app.use(`${apiBase}/jobs`, createJobsRouter(scrapeService));

    // 404 Handler
    this.app.use(notFoundHandler);
  }

  /** 🧩 Global Error Handler */
  private initializeErrorHandling(): void {
    this.app.use(errorHandler);
  }

  /** 🚀 Start workers, reaper and HTTP server */
  public async start(): Promise<void> {
    const { config, pool, reaper } = this.container;
    try {
      pool.start();
      reaper.start();

      await new Promise<void>((resolve, reject) => {
        this.httpServer.once('error', reject);
        this.httpServer.listen(config.port, () => resolve());
      });

      logger.info(`🚀 Reddit Extractor API running on port ${config.port}`);
      logger.info(`📊 Environment: ${config.nodeEnv}`);
      logger.info(`🔗 API Base: http://localhost:${config.port}${config.apiPrefix}`);

      // Handle graceful shutdowns
      process.on('SIGTERM', () => void this.gracefulShutdown());
      process.on('SIGINT', () => void this.gracefulShutdown());
    } catch (err) {
      logger.error('❌ Failed to start server:', err);
      process.exit(1);
    }
  }

  /** 🧹 Stops workers and deliveries, then closes connections. */
  public async stop(): Promise<void> {
    const { pool, reaper, dispatcher, redis } = this.container;

    if (this.httpServer.listening) {
      await new Promise<void>((resolve) => this.httpServer.close(() => resolve()));
    }
    logger.info('HTTP server closed');

    reaper.stop();
    await pool.stop();
    await dispatcher.stop();
    logger.info('✅ Workers and webhook deliveries drained');

    if (redis) {
      await closeRedisClient();
      logger.info('✅ Redis connection closed');
    }
  }

  /** 🛑 Graceful Shutdown */
  private async gracefulShutdown(): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    logger.info('🛑 Initiating graceful shutdown...');

    try {
      await this.stop();
      logger.info('🟢 Shutdown complete. Exiting process...');
      await closeLogger();
      process.exit(0);
    } catch (err) {
      logger.error('💥 Error during shutdown:', err);
      process.exit(1);
    }
  }
}

export default ScrapeApiServer;
