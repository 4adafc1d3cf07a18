import 'dotenv/config';
import { HttpServer } from './api/HttpServer';
import { CONFIG, logConfigSummary, validateConfig } from './config/env';
import { describeError } from './core/errors';
import { StructuredLogger, parseLogLevel } from './core/StructuredLogger';
import { SiteName } from './extractors';
import { SiteMonitor, createSiteMonitor } from './watchers/MonitorFactory';

const logger = new StructuredLogger({
  level: parseLogLevel(CONFIG.LOG_LEVEL),
  format: CONFIG.LOG_FORMAT === 'json' ? 'json' : 'pretty',
  component: 'ListingWatch'
});

const SITES: SiteName[] = ['pararius', 'funda'];

// Handles des boucles, détenus par l'orchestrateur
const abortController = new AbortController();
let runs: Promise<void>[] = [];
let httpServer: HttpServer | null = null;
let isShuttingDown = false;

async function gracefulShutdown(signal: string, exitCode = 0): Promise<void> {
  if (isShuttingDown) {
    logger.info(`[${signal}] Shutdown already in progress, ignoring...`);
    return;
  }

  isShuttingDown = true;
  logger.info(`🛑 Received ${signal}, shutting down gracefully...`);

  try {
    // 1. Annuler les boucles et attendre leur dernière sauvegarde
    abortController.abort();
    await Promise.allSettled(runs);
    logger.info('✅ Monitors stopped and state saved');

    // 2. Arrêter le serveur HTTP
    if (httpServer) {
      await httpServer.stop();
    }

    logger.info('✅ Graceful shutdown complete');
    process.exit(exitCode);
  } catch (error) {
    logger.error('❌ Error during shutdown', error);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  logger.info('🚀 Starting listing monitor...');

  const validation = validateConfig();
  for (const warning of validation.warnings) {
    logger.warn(`⚠️ ${warning}`);
  }
  if (!validation.isValid) {
    for (const error of validation.errors) {
      logger.error(`❌ ${error}`);
    }
    logger.fatal('Environment validation failed. Cannot start application.');
    process.exit(1);
  }
  logConfigSummary();

  const monitors = SITES
    .map(site => createSiteMonitor(site, CONFIG, logger))
    .filter((monitor): monitor is SiteMonitor => monitor !== null);

  runs = monitors.map(monitor =>
    monitor.poller.run(abortController.signal).catch((error: unknown) => {
      logger.error(`💥 ${monitor.name} monitor stopped unexpectedly: ${describeError(error)}`, error);
    })
  );

  httpServer = new HttpServer(monitors, logger, { port: CONFIG.PORT });
  await httpServer.start();

  process.on('SIGINT', () => { void gracefulShutdown('SIGINT'); });
  process.on('SIGTERM', () => { void gracefulShutdown('SIGTERM'); });

  logger.info(`🚀 ${monitors.length} monitors running. Press Ctrl+C to stop.`);
}

process.on('uncaughtException', (error) => {
  logger.fatal('💥 Uncaught Exception', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION', 1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('💥 Unhandled Rejection', reason);
  void gracefulShutdown('UNHANDLED_REJECTION', 1);
});

main().catch((error: unknown) => {
  logger.fatal('❌ Failed to start monitor', error);
  process.exit(1);
});
