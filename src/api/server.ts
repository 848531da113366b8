import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { Logger } from 'winston';
import { ZodError } from 'zod';
import { SiteAnalysisService } from '../analysis/analysis-service.js';
import { DeepCrawler } from '../crawler/deep-crawler.js';
import { HttpPageFetcher } from '../fetch/page-fetcher.js';
import {
  AnalyzeRequestSchema,
  ResolveRequestSchema,
  SessionParamsSchema,
  UsageFeedbackSchema,
} from '../schemas/api.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import type { ApiOptions, DeepScrapeResult, PageFetcher, ProfileStore } from '../types/index.js';

export const SERVICE_NAME = 'sitelens';
export const SERVICE_VERSION = '0.1.0';

export class SiteLensAPI {
  private readonly app: Application;
  private readonly host: string;
  private readonly port: number;
  private readonly profileStore: ProfileStore;
  private readonly fetcher: PageFetcher;
  private readonly analysis: SiteAnalysisService;
  private readonly sessions: DeepScrapeResult[] = [];
  private readonly logger: Logger;
  private server: Server | null = null;

  constructor(options: ApiOptions) {
    this.app = express();
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? 8080;
    this.profileStore = options.profileStore;
    this.fetcher = options.fetcher ?? new HttpPageFetcher();
    this.logger = createLogger({ name: 'api' });
    this.analysis = new SiteAnalysisService({
      fetcher: this.fetcher,
      profileStore: this.profileStore,
      autoSaveThreshold: options.autoSaveThreshold,
    });

    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '1mb' }));

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger.http(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/api/health', (_req: Request, res: Response): void => {
      res.json({ status: 'healthy', version: SERVICE_VERSION, service: SERVICE_NAME });
    });

    this.app.post('/api/analyze', async (req: Request, res: Response): Promise<void> => {
      try {
        const { url, ...options } = AnalyzeRequestSchema.parse(req.body);
        const outcome = await this.analysis.analyzeUrl(url, options);
        res.status(outcome.success ? 200 : 502).json(outcome);
      } catch (error) {
        this.handleError(res, error);
      }
    });

    this.app.post('/api/resolve', async (req: Request, res: Response): Promise<void> => {
      try {
        const { url, ...options } = ResolveRequestSchema.parse(req.body);
        res.json(await this.analysis.resolveSelectors(url, options));
      } catch (error) {
        this.handleError(res, error);
      }
    });

    this.app.post('/api/deep-scrape', async (req: Request, res: Response): Promise<void> => {
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) controller.abort();
      });

      try {
        const crawler = new DeepCrawler(req.body, { fetcher: this.fetcher });
        const result = await crawler.crawl({ signal: controller.signal });
        this.sessions.push(result);
        res.json({
          success: result.status !== 'failed',
          message: `Crawled ${result.totalPagesCrawled} pages`,
          result,
        });
      } catch (error) {
        this.handleError(res, error);
      }
    });

    this.app.get('/api/sessions', (_req: Request, res: Response): void => {
      res.json(this.sessions);
    });

    this.app.get('/api/sessions/:index', (req: Request, res: Response): void => {
      try {
        const { index } = SessionParamsSchema.parse(req.params);
        const session = this.sessions[index];
        if (!session) {
          res.status(404).json({ success: false, message: 'Session not found' });
          return;
        }
        res.json(session);
      } catch (error) {
        this.handleError(res, error);
      }
    });

    this.app.delete('/api/sessions', (_req: Request, res: Response): void => {
      const cleared = this.sessions.length;
      this.sessions.length = 0;
      res.json({ success: true, message: `Cleared ${cleared} sessions` });
    });

    this.app.get('/api/profiles', async (_req: Request, res: Response): Promise<void> => {
      try {
        res.json(await this.profileStore.getAll());
      } catch (error) {
        this.handleError(res, error);
      }
    });

    this.app.get('/api/profiles/stats', async (_req: Request, res: Response): Promise<void> => {
      try {
        res.json(await this.profileStore.getStats());
      } catch (error) {
        this.handleError(res, error);
      }
    });

    this.app.delete('/api/profiles', async (_req: Request, res: Response): Promise<void> => {
      try {
        const removed = await this.profileStore.clearAll();
        res.json({ success: true, message: `Cleared ${removed} profiles` });
      } catch (error) {
        this.handleError(res, error);
      }
    });

    this.app.get('/api/profiles/domain/:domain', async (req: Request, res: Response): Promise<void> => {
      try {
        const domain = (req.params['domain'] ?? '').toLowerCase();
        const profile = await this.profileStore.getByDomain(domain);
        if (!profile) {
          res.status(404).json({ success: false, message: `No profile for ${domain}` });
          return;
        }
        res.json(profile);
      } catch (error) {
        this.handleError(res, error);
      }
    });

    this.app.get('/api/profiles/:id', async (req: Request, res: Response): Promise<void> => {
      try {
        const profile = await this.profileStore.getById(req.params['id'] ?? '');
        if (!profile) {
          res.status(404).json({ success: false, message: 'Profile not found' });
          return;
        }
        res.json(profile);
      } catch (error) {
        this.handleError(res, error);
      }
    });

    this.app.delete('/api/profiles/:id', async (req: Request, res: Response): Promise<void> => {
      try {
        const removed = await this.profileStore.delete(req.params['id'] ?? '');
        if (!removed) {
          res.status(404).json({ success: false, message: 'Profile not found' });
          return;
        }
        res.json({ success: true, message: 'Profile deleted' });
      } catch (error) {
        this.handleError(res, error);
      }
    });

    this.app.post('/api/profiles/:id/usage', async (req: Request, res: Response): Promise<void> => {
      try {
        const { success } = UsageFeedbackSchema.parse(req.body);
        const profile = await this.analysis.recordFeedback(req.params['id'] ?? '', success);
        if (!profile) {
          res.status(404).json({ success: false, message: 'Profile not found' });
          return;
        }
        res.json(profile);
      } catch (error) {
        this.handleError(res, error);
      }
    });
  }

  private handleError(res: Response, error: unknown): void {
    if (error instanceof ZodError) {
      res.status(400).json({ success: false, message: 'Invalid request', errors: error.issues });
      return;
    }

    this.logger.error('Request failed', { error: errorMessage(error) });
    res.status(500).json({ success: false, message: errorMessage(error) });
  }

  async start(): Promise<void> {
    return new Promise((resolve) => {
      this.server = this.app.listen(this.port, this.host, () => {
        this.logger.info(`API listening on http://${this.host}:${this.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
    await this.profileStore.close();
  }
}
