import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import cors from 'cors';
import { z } from 'zod';
import { QueryRouterService } from '../../application/services/QueryRouterService.js';
import { GENERIC_FAILURE_MESSAGE, errorMessage } from '../../core/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';

const QueryBodySchema = z.object({
  query: z.string().max(4000, 'query must be at most 4000 characters'),
});

// Shape of the errors express.json() raises for unreadable bodies
const BodyParserErrorSchema = z.object({
  type: z.string(),
  status: z.number().int().min(400).max(499),
});

/**
 * JSON API over the query router
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;

  constructor(
    private router: QueryRouterService,
    private port: number = 3001,
    private logger: Logger = silentLogger
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '64kb' }));
  }

  private setupRoutes(): void {
    // API: Answer a query
    this.app.post('/api/query', async (req: Request, res: Response) => {
      const body = QueryBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({
          success: false,
          error: body.error.errors.map((err) => `${err.path.join('.') || 'body'}: ${err.message}`).join('; '),
        });
        return;
      }

      // Abort the upstream call if the client goes away before we answer
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      });

      try {
        const result = await this.router.handle(body.data.query, { signal: controller.signal });
        res.json({
          success: true,
          data: {
            domain: result.domain,
            response: result.response,
            model: result.model,
            durationMs: result.durationMs,
          },
        });
      } catch {
        if (controller.signal.aborted) {
          this.logger.debug('Client disconnected before the answer was ready');
          return;
        }
        res.status(502).json({ success: false, error: GENERIC_FAILURE_MESSAGE });
      }
    });

    // API: Classify a query without calling the model
    this.app.post('/api/classify', (req: Request, res: Response) => {
      const body = QueryBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({
          success: false,
          error: body.error.errors.map((err) => `${err.path.join('.') || 'body'}: ${err.message}`).join('; '),
        });
        return;
      }
      res.json({ success: true, data: this.router.classify(body.data.query) });
    });

    // API: List domains
    this.app.get('/api/domains', (req: Request, res: Response) => {
      res.json({ success: true, data: this.router.describeDomains() });
    });

    // API: Health
    this.app.get('/api/health', async (req: Request, res: Response) => {
      const upstreamReachable = await this.router.checkUpstream();
      res.status(upstreamReachable ? 200 : 503).json({
        success: upstreamReachable,
        data: {
          status: upstreamReachable ? 'healthy' : 'degraded',
          timestamp: new Date().toISOString(),
          model: this.router.model,
          upstream: upstreamReachable ? 'reachable' : 'unreachable',
        },
      });
    });
  }

  private setupErrorHandler(): void {
    this.app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
      const bodyError = BodyParserErrorSchema.safeParse(err);
      if (!bodyError.success) {
        next(err);
        return;
      }
      res.status(bodyError.data.status).json({
        success: false,
        error:
          bodyError.data.type === 'entity.parse.failed' ? 'Request body must be valid JSON' : errorMessage(err),
      });
    });
  }

  /**
   * Start listening; resolves with the bound port (useful when port is 0)
   */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port);
      server.once('listening', () => {
        this.httpServer = server;
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        this.logger.info('HTTP API listening', { port });
        resolve(port);
      });
      server.once('error', reject);
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.httpServer) {
        resolve();
        return;
      }
      this.httpServer.close((error) => {
        this.httpServer = null;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  isRunning(): boolean {
    return this.httpServer !== null;
  }
}
