import express from 'express';
import { Server } from 'http';
import { StructuredLogger } from '../core/StructuredLogger';
import { ListingPoller } from '../watchers/ListingPoller';

export interface HttpServerConfig {
  port: number;
  host: string;
  enableLogging: boolean;
}

export interface MonitorHandle {
  name: string;
  sources: string[];
  poller: ListingPoller;
}

/**
 * Endpoints de statut: / (configuration) et /health (état des boucles)
 */
export class HttpServer {
  private app: express.Application;
  private server: Server | null = null;
  private config: HttpServerConfig;
  private monitors: MonitorHandle[];
  private logger: StructuredLogger;

  constructor(monitors: MonitorHandle[], logger: StructuredLogger, config: Partial<HttpServerConfig> = {}) {
    this.monitors = monitors;
    this.logger = logger.child('HttpServer');
    this.config = {
      port: 5000,
      host: '0.0.0.0',
      enableLogging: true,
      ...config
    };

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    if (this.config.enableLogging) {
      this.app.use((req, res, next) => {
        const start = Date.now();
        res.on('finish', () => {
          this.logger.debug(`${req.method} ${req.path} - ${res.statusCode} - ${Date.now() - start}ms`);
        });
        next();
      });
    }
  }

  private setupRoutes(): void {
    this.app.get('/', (req, res) => {
      res.json(this.getOverview());
    });

    this.app.get('/health', (req, res) => {
      const health = this.getHealthStatus();
      res.status(health.status === 'healthy' ? 200 : 503).json(health);
    });
  }

  getOverview() {
    const monitors: Record<string, { configuredUrls: number; running: boolean; state: string }> = {};
    for (const monitor of this.monitors) {
      const status = monitor.poller.getStatus();
      monitors[monitor.name] = {
        configuredUrls: monitor.sources.length,
        running: status.isRunning,
        state: status.state
      };
    }

    return {
      status: 'app_running',
      monitors,
      ...(this.monitors.length === 0
        ? { message: 'No monitor URLs configured. App is running but no monitoring is active.' }
        : {})
    };
  }

  getHealthStatus() {
    const monitors: Record<string, {
      configured: boolean;
      running: boolean;
      lastCheckAt: string | null;
      cycles: number;
      lastError: string | null;
    }> = {};
    let degraded = false;

    for (const monitor of this.monitors) {
      const status = monitor.poller.getStatus();
      if (!status.isRunning) degraded = true;

      monitors[monitor.name] = {
        configured: true,
        running: status.isRunning,
        lastCheckAt: status.lastCheckAt,
        cycles: status.totalCycles,
        lastError: status.lastError
      };
    }

    return {
      status: degraded ? 'degraded' : 'healthy',
      uptimeSeconds: Math.round(process.uptime()),
      monitors
    };
  }

  /**
   * Démarre l'écoute et retourne le port effectif (utile avec port 0)
   */
  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.config.port;
        this.logger.info(`🌐 Status server started on ${this.config.host}:${port}`);
        resolve(port);
      });
      this.server = server;

      server.on('error', (error) => {
        this.logger.error('❌ Status server error', error);
        reject(error);
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          this.logger.info('🛑 Status server stopped');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}
