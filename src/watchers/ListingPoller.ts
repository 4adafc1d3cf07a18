import fs from 'fs';
import path from 'path';
import { ChangeDetector } from '../core/ChangeDetector';
import { ExtractionError, PersistenceError, describeError } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { countSeen, ensureSource } from '../store/SeenStore';
import { Extractor, ListingSnapshot, Notifier, RawRecord, SeenSet, Source } from '../types/listing';

export type PollerState = 'STARTING' | 'INITIAL_CHECK' | 'WAITING' | 'CHECKING' | 'STOPPED';

export interface ListingPollerConfig {
  name: string;
  sources: Source[];
  intervalMs: number;
  jitterFraction: number;
  minSleepMs: number;
  politeDelayMinMs: number;
  politeDelayMaxMs: number;
  notifyDelayMinMs: number;
  notifyDelayMaxMs: number;
  fatalBackoffJitterMs: number;
  dumpDir: string;
}

export interface SeenPersistence {
  load(): Promise<SeenSet>;
  save(seen: SeenSet): Promise<void>;
}

/** Retourne false si le signal a interrompu l'attente */
export type SleepFn = (ms: number, signal: AbortSignal) => Promise<boolean>;

export type FetchPageFn = (url: string, signal: AbortSignal) => Promise<string>;

export interface ListingPollerDeps {
  store: SeenPersistence;
  detector: ChangeDetector;
  extractor: Extractor;
  fetchPage: FetchPageFn;
  notifier: Notifier;
  logger: StructuredLogger;
  sleep?: SleepFn;
  random?: () => number;
}

export interface CycleReport {
  newListings: number;
  failedSources: number;
  notificationsSent: number;
  notificationsFailed: number;
  saved: boolean;
}

// Jamais moins d'une minute entre deux vérifications
export const MIN_SLEEP_MS = 60_000;

export const DEFAULT_POLLER_CONFIG: Omit<ListingPollerConfig, 'name' | 'sources'> = {
  intervalMs: 900_000,
  jitterFraction: 0.1,
  minSleepMs: MIN_SLEEP_MS,
  politeDelayMinMs: 1000,
  politeDelayMaxMs: 3000,
  notifyDelayMinMs: 1000,
  notifyDelayMaxMs: 3000,
  fatalBackoffJitterMs: 60_000,
  dumpDir: ''
};

/**
 * Attente interruptible par un AbortSignal
 */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);

  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Boucle de surveillance d'un site: vérification immédiate, puis attente avec jitter
 * et vérification séquentielle de chaque source. Ne s'arrête que sur annulation.
 */
export class ListingPoller {
  private readonly config: ListingPollerConfig;
  private readonly store: SeenPersistence;
  private readonly detector: ChangeDetector;
  private readonly extractor: Extractor;
  private readonly fetchPage: FetchPageFn;
  private readonly notifier: Notifier;
  private readonly logger: StructuredLogger;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  private seen: SeenSet = {};
  private state: PollerState = 'STARTING';
  private isRunning: boolean = false;

  // Métriques
  private totalCycles: number = 0;
  private totalNewListings: number = 0;
  private notificationsSent: number = 0;
  private notificationsFailed: number = 0;
  private fatalErrors: number = 0;
  private lastCheckAt: string | null = null;
  private lastCheckDurationMs: number = 0;
  private lastError: string | null = null;
  private sourceErrors: Map<Source, string> = new Map();

  constructor(config: Pick<ListingPollerConfig, 'name' | 'sources'> & Partial<ListingPollerConfig>, deps: ListingPollerDeps) {
    this.config = { ...DEFAULT_POLLER_CONFIG, ...config };
    this.store = deps.store;
    this.detector = deps.detector;
    this.extractor = deps.extractor;
    this.fetchPage = deps.fetchPage;
    this.notifier = deps.notifier;
    this.logger = deps.logger.child(`ListingPoller:${config.name}`);
    this.sleep = deps.sleep ?? abortableSleep;
    this.random = deps.random ?? Math.random;
  }

  /**
   * Lance la boucle jusqu'à l'annulation du signal, puis sauvegarde une dernière fois
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('⚠️ Poller already running');
      return;
    }
    this.isRunning = true;
    this.state = 'STARTING';

    try {
      this.seen = await this.store.load();
      for (const source of this.config.sources) {
        ensureSource(this.seen, source);
      }

      this.logger.info(`🚀 Monitoring ${this.config.sources.length} sources every ~${Math.round(this.config.intervalMs / 1000)}s`);

      let skipWait = true; // premier passage: vérification immédiate
      while (!signal.aborted) {
        try {
          if (!skipWait) {
            this.state = 'WAITING';
            const waitMs = this.nextWaitMs();
            this.logger.info(`😴 Sleeping for approximately ${Math.round(waitMs / 1000)}s`);
            if (!(await this.sleep(waitMs, signal))) break;
          }

          this.state = this.totalCycles === 0 ? 'INITIAL_CHECK' : 'CHECKING';
          await this.checkOnce(signal);
          skipWait = false;
        } catch (error) {
          this.fatalErrors++;
          this.lastError = describeError(error);
          this.logger.error('🚨 Unexpected error in monitor loop', error);

          this.state = 'WAITING';
          const backoffMs = this.fatalBackoffMs();
          this.logger.info(`⏳ Backing off for ${Math.round(backoffMs / 1000)}s before retrying`);
          if (!(await this.sleep(backoffMs, signal))) break;
          skipWait = true;
        }
      }
    } finally {
      this.logger.info('🛑 Cancellation received, saving state before exit');
      try {
        await this.persist();
      } catch (error) {
        this.logger.error('💾 Final save failed', error);
      }
      this.state = 'STOPPED';
      this.isRunning = false;
    }
  }

  /**
   * Un cycle complet: toutes les sources, sauvegarde, puis notifications
   */
  async checkOnce(signal: AbortSignal): Promise<CycleReport> {
    const startTime = Date.now();
    this.totalCycles++;
    this.logger.info(`🔎 Check #${this.totalCycles} started`);

    const newSnapshots: ListingSnapshot[] = [];
    let failedSources = 0;

    for (let i = 0; i < this.config.sources.length; i++) {
      const source = this.config.sources[i];

      // Délai de politesse entre deux pages du même site
      if (i > 0 && !(await this.sleep(this.randomBetween(this.config.politeDelayMinMs, this.config.politeDelayMaxMs), signal))) {
        break;
      }

      try {
        newSnapshots.push(...(await this.checkSource(source, signal)));
        this.sourceErrors.delete(source);
      } catch (error) {
        failedSources++;
        const message = describeError(error);
        this.sourceErrors.set(source, message);
        this.logger.error(`❌ Source check failed: ${message}`, undefined, { source });
      }
    }

    const saved = await this.persist();

    let sent = 0;
    let failed = 0;
    for (let i = 0; i < newSnapshots.length; i++) {
      if (i > 0 && !(await this.sleep(this.randomBetween(this.config.notifyDelayMinMs, this.config.notifyDelayMaxMs), signal))) {
        break;
      }
      // Annulation vue pendant les sources: état sauvegardé, aucun SMS
      if (signal.aborted) break;
      if (await this.safeNotify(newSnapshots[i])) {
        sent++;
      } else {
        failed++;
      }
    }

    this.totalNewListings += newSnapshots.length;
    this.notificationsSent += sent;
    this.notificationsFailed += failed;
    this.lastCheckAt = new Date().toISOString();
    this.lastCheckDurationMs = Date.now() - startTime;

    this.logger.info(`✅ Check #${this.totalCycles} complete: ${newSnapshots.length} new listings`, {
      failedSources,
      notificationsSent: sent,
      notificationsFailed: failed,
      durationMs: this.lastCheckDurationMs
    });

    return { newListings: newSnapshots.length, failedSources, notificationsSent: sent, notificationsFailed: failed, saved };
  }

  getSeen(): SeenSet {
    return this.seen;
  }

  getState(): PollerState {
    return this.state;
  }

  getStatus() {
    return {
      name: this.config.name,
      state: this.state,
      isRunning: this.isRunning,
      totalCycles: this.totalCycles,
      totalNewListings: this.totalNewListings,
      notificationsSent: this.notificationsSent,
      notificationsFailed: this.notificationsFailed,
      fatalErrors: this.fatalErrors,
      lastCheckAt: this.lastCheckAt,
      lastCheckDurationMs: this.lastCheckDurationMs,
      lastError: this.lastError,
      sources: this.config.sources.map(source => ({
        source,
        seen: countSeen(this.seen, source),
        lastError: this.sourceErrors.get(source) ?? null
      }))
    };
  }

  /**
   * Intervalle configuré ± jitter, jamais sous le plancher
   */
  nextWaitMs(): number {
    const jitter = (this.random() * 2 - 1) * this.config.jitterFraction;
    return Math.max(this.config.minSleepMs, this.config.intervalMs * (1 + jitter));
  }

  fatalBackoffMs(): number {
    return this.config.intervalMs * 2 + this.random() * this.config.fatalBackoffJitterMs;
  }

  private async checkSource(source: Source, signal: AbortSignal): Promise<ListingSnapshot[]> {
    this.logger.info('📡 Fetching listings', { source });
    const html = await this.fetchPage(source, signal);

    let records: RawRecord[];
    try {
      records = this.extractor(html);
    } catch (error) {
      await this.dumpHtml(html, source, 'parse_error');
      throw new ExtractionError(source, `Extraction failed for ${source}`, error);
    }
    this.logger.debug(`Found ${records.length} listings on page`, { source });

    if (records.length === 0) {
      await this.dumpHtml(html, source, 'no_listings');
    }

    return this.detector.detect(source, records, this.seen).newSnapshots;
  }

  private async safeNotify(snapshot: ListingSnapshot): Promise<boolean> {
    try {
      const ok = await this.notifier.notify(snapshot);
      if (!ok) {
        this.logger.warn(`⚠️ Notification failed for ${snapshot.title}, listing stays marked as seen`, { key: snapshot.key });
      }
      return ok;
    } catch (error) {
      this.logger.error(`❌ Notifier threw for ${snapshot.title}`, error, { key: snapshot.key });
      return false;
    }
  }

  /**
   * Sauvegarde; un échec de persistance est loggé et retenté au cycle suivant
   */
  private async persist(): Promise<boolean> {
    try {
      await this.store.save(this.seen);
      return true;
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      this.lastError = describeError(error);
      this.logger.error(`💾 ${describeError(error)}, will retry next cycle`);
      return false;
    }
  }

  private async dumpHtml(html: string, source: Source, reason: 'no_listings' | 'parse_error'): Promise<void> {
    if (!this.config.dumpDir) return;

    const stamp = new Date().toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
    const filePath = path.join(this.config.dumpDir, `${this.config.name}_${reason}_${stamp}.html`);
    try {
      await fs.promises.mkdir(this.config.dumpDir, { recursive: true });
      await fs.promises.writeFile(filePath, html, 'utf-8');
      this.logger.info(`📝 Saved HTML dump for analysis: ${filePath}`, { source });
    } catch (error) {
      this.logger.error(`Failed to save HTML dump: ${describeError(error)}`, undefined, { source });
    }
  }

  private randomBetween(min: number, max: number): number {
    return min + this.random() * (max - min);
  }
}
