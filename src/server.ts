import express, { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import type { ZodType, ZodTypeDef } from 'zod';
import { PromptRequestSchema, SessionRequestSchema, SyncRequestSchema } from './config/schema.js';
import { parseWith } from './config/store.js';
import { describeError, httpStatusFor } from './errors.js';
import type { Orchestrator } from './orchestrator.js';
import { logger } from './utils/logger.js';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * HTTP surface over the orchestrator. Error kinds map to status codes; the
 * body is always `{ error: { kind, message } }`.
 */
export class ForgeServer {
  private app: express.Application;
  private server: Server | null = null;

  constructor(
    private orchestrator: Orchestrator,
    private port: number = 8765,
    private host: string = '127.0.0.1'
  ) {
    this.app = express();
    this.app.use(express.json({ limit: '1mb' }));
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  private setupMiddleware(): void {
    // Request logging
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`, { body: req.body });
      next();
    });
  }

  private route(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
      handler(req, res).catch(next);
    };
  }

  private body<Out>(schema: ZodType<Out, ZodTypeDef, unknown>, req: Request): Out {
    return parseWith(schema, req.body ?? {}, 'request body');
  }

  private setupRoutes(): void {
    // Liveness only; touches no state
    this.app.get('/healthz', (_req: Request, res: Response) => {
      res.json({ status: 'ok' });
    });

    this.app.get(
      '/state',
      this.route(async (_req, res) => {
        res.json(await this.orchestrator.model.store.dumpState());
      })
    );

    this.app.post(
      '/sync',
      this.route(async (req, res) => {
        const { feature, repos, hosts, dryRun } = this.body(SyncRequestSchema, req);
        const report = await this.orchestrator.sync(feature, { repos, hosts, dryRun });
        res.status(report.ok ? 200 : 207).json(report);
      })
    );

    this.app.post(
      '/sessions/start',
      this.route(async (req, res) => {
        const request = this.body(SessionRequestSchema, req);
        res.json(await this.orchestrator.startSession(request));
      })
    );

    this.app.post(
      '/sessions/stop',
      this.route(async (req, res) => {
        const { feature, repo, llm, host } = this.body(SessionRequestSchema, req);
        res.json(await this.orchestrator.stopSession({ feature, repo, llm, host }));
      })
    );

    this.app.get(
      '/sessions',
      this.route(async (req, res) => {
        const host = typeof req.query.host === 'string' ? req.query.host : undefined;
        res.json({ sessions: await this.orchestrator.sessionStatus(host) });
      })
    );

    this.app.post(
      '/prompt',
      this.route(async (req, res) => {
        const request = this.body(PromptRequestSchema, req);
        res.json(await this.orchestrator.sendPrompt(request));
      })
    );
  }

  private setupErrorHandler(): void {
    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      // Malformed JSON from express.json()
      if (err instanceof SyntaxError) {
        res.status(400).json({ error: { kind: 'ValidationError', message: err.message } });
        return;
      }
      const { kind, message } = describeError(err);
      const status = httpStatusFor(err);
      if (status >= 500) {
        logger.error('Server error', err);
      } else {
        logger.warn('Request failed', { kind, message });
      }
      res.status(status).json({ error: { kind, message } });
    });
  }

  /**
   * Start the server.
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host);
      const onError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once('error', onError);
      server.once('listening', () => {
        server.off('error', onError);
        logger.info(`Server listening on http://${this.host}:${this.port}`);
        resolve();
      });
      this.server = server;
    });
  }

  /**
   * Stop the server.
   */
  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close((err) => {
          if (err) {
            logger.warn('Error stopping server', err);
          }
          this.server = null;
          logger.info('Server stopped');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  getPort(): number {
    return this.port;
  }

  /**
   * Get the express app instance (for testing).
   */
  getApp(): express.Application {
    return this.app;
  }
}
