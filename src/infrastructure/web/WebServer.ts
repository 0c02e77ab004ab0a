import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import type { StatusService } from '../../application/services/StatusService.js';
import { toJobSnapshot, type Job } from '../../core/entities/Job.js';
import { NotFoundError, ValidationError } from '../../core/errors.js';

export type ServerMessage =
  | { type: 'connected'; timestamp: string }
  | { type: 'job_updated'; jobId: string; status: Job['status']; timestamp: string };

/**
 * HTTP/JSON face of the mock job backend, plus a WebSocket feed of job updates
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private detachJobListener: (() => void) | null = null;

  constructor(
    private statusService: StatusService,
    private port: number = 5000,
    private host: string = '127.0.0.1',
    private debug: boolean = false
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());

    if (this.debug) {
      this.app.use((req: Request, _res: Response, next: NextFunction) => {
        console.error(`[WebServer] ${req.method} ${req.originalUrl}`);
        next();
      });
    }
  }

  private setupRoutes(): void {
    // Submit a job
    this.app.post('/v2/:endpointId/run', (req: Request, res: Response) => {
      const jobId = this.statusService.submitRequest(req.body);
      res.json({ id: jobId, status: 'PENDING' });
    });

    // Job status
    this.app.get('/v2/:endpointId/status/:jobId', (req: Request, res: Response) => {
      const job = this.statusService.poll(req.params.jobId);
      res.json(toJobSnapshot(job));
    });

    // Cancel a job (status is left unchanged when it is no longer pending)
    this.app.post('/v2/:endpointId/cancel/:jobId', (req: Request, res: Response) => {
      const cancelled = this.statusService.cancel(req.params.jobId);
      const job = this.statusService.poll(req.params.jobId);
      res.json({ id: job.id, status: job.status, cancelled });
    });

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json(this.statusService.health());
    });

    // Diagnostics: every job known to the backend
    this.app.get('/jobs', (_req: Request, res: Response) => {
      res.json(this.statusService.listAll().map(toJobSnapshot));
    });

    this.app.post('/reset', (_req: Request, res: Response) => {
      const cleared = this.statusService.resetAll();
      res.json({ message: 'All jobs cleared', cleared });
    });
  }

  private setupErrorHandler(): void {
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Route not found' });
    });

    // express recognises error handlers by their four parameters
    this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof ValidationError) {
        res.status(400).json({ error: error.message, details: error.issues });
        return;
      }
      if (error instanceof NotFoundError) {
        res.status(404).json({ error: 'Job not found' });
        return;
      }
      if (error instanceof SyntaxError) {
        // body-parser rejects malformed JSON before any route runs
        res.status(400).json({ error: 'Malformed JSON body' });
        return;
      }

      console.error('[WebServer] Request failed:', error);
      res.status(500).json({
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.clients.add(ws);

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });

      this.send(ws, { type: 'connected', timestamp: new Date().toISOString() });
    });

    this.detachJobListener = this.statusService.onJobUpdated((job) => {
      this.notifyJobUpdate(job.id, job.status);
    });
  }

  private send(client: WebSocket, message: ServerMessage): void {
    if (client.readyState === WebSocket.OPEN) {
      client.send(JSON.stringify(message));
    }
  }

  public broadcast(message: ServerMessage): void {
    this.clients.forEach((client) => this.send(client, message));
  }

  public notifyJobUpdate(jobId: string, status: Job['status']): void {
    this.broadcast({
      type: 'job_updated',
      jobId,
      status,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Port actually bound (useful when started on port 0)
   */
  public getPort(): number {
    const address = this.httpServer?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.port;
  }

  public getUrl(): string {
    return `http://${this.host}:${this.getPort()}`;
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        console.error(`[WebServer] Mock backend available at ${this.getUrl()}`);
        this.setupWebSocket();
        resolve();
      });
      this.httpServer = server;

      server.on('error', (error) => {
        console.error('[WebServer] Server error:', error);
        reject(error);
      });
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.detachJobListener?.();
      this.detachJobListener = null;

      this.clients.forEach((client) => {
        client.terminate();
      });
      this.clients.clear();

      this.wss?.close();
      this.wss = null;

      const server = this.httpServer;
      this.httpServer = null;
      if (!server) {
        resolve();
        return;
      }

      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        console.error('[WebServer] HTTP server closed');
        resolve();
      });
      server.closeAllConnections();
    });
  }
}
