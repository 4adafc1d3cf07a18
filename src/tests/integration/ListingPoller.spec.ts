import fs from 'fs';
import os from 'os';
import path from 'path';
import { ChangeDetector } from '../../core/ChangeDetector';
import { FetchError, PersistenceError } from '../../core/errors';
import { Extractor, Notifier, SeenSet } from '../../types/listing';
import { FetchPageFn, ListingPoller, ListingPollerConfig, PollerState, SleepFn } from '../../watchers/ListingPoller';
import { MemoryStore, RecordingNotifier, SOURCE_A, SOURCE_B, ScriptedSleep, record } from '../helpers/fixtures';
import { LogSink } from '../utils/LogSink';

// Page simulée: "1,2,3" = annonces 1, 2 et 3; "" = aucune annonce
const csvExtractor: Extractor = html => (html ? html.split(',').map(id => record(id)) : []);

interface Harness {
  poller: ListingPoller;
  store: MemoryStore;
  notifier: Notifier;
  sleeper: ScriptedSleep;
  fetched: string[];
}

function createHarness(options: {
  pages: Record<string, string | Error>;
  sources?: string[];
  store?: MemoryStore;
  notifier?: Notifier;
  sleeper?: ScriptedSleep;
  sleep?: SleepFn;
  extractor?: Extractor;
  random?: () => number;
  config?: Partial<ListingPollerConfig>;
}): Harness {
  const sink = new LogSink();
  const store = options.store ?? new MemoryStore();
  const notifier = options.notifier ?? new RecordingNotifier();
  const sleeper = options.sleeper ?? new ScriptedSleep();
  const fetched: string[] = [];

  const fetchPage: FetchPageFn = async url => {
    fetched.push(url);
    const page = options.pages[url];
    if (page instanceof Error) throw page;
    return page ?? '';
  };

  const poller = new ListingPoller(
    { name: 'pararius', sources: options.sources ?? [SOURCE_A], ...options.config },
    {
      store,
      detector: new ChangeDetector(sink.createLogger(), () => new Date('2024-05-01T10:00:00.000Z')),
      extractor: options.extractor ?? csvExtractor,
      fetchPage,
      notifier,
      logger: sink.createLogger(),
      sleep: options.sleep ?? sleeper.sleep,
      random: options.random ?? (() => 0.5)
    }
  );

  return { poller, store, notifier, sleeper, fetched };
}

describe('ListingPoller', () => {
  describe('run', () => {
    it('should check immediately, then wait the jittered interval', async () => {
      const notifier = new RecordingNotifier();
      const { poller, sleeper, fetched } = createHarness({
        pages: { [SOURCE_A]: '1,2', [SOURCE_B]: '3' },
        sources: [SOURCE_A, SOURCE_B],
        notifier
      });
      const controller = new AbortController();

      const running = poller.run(controller.signal);
      await sleeper.blocked;

      expect(fetched).toEqual([SOURCE_A, SOURCE_B]);
      // politesse entre les deux pages, puis deux délais entre trois SMS, puis l'intervalle
      expect(sleeper.calls).toEqual([2000, 2000, 2000, 900000]);
      expect(notifier.notified.map(s => s.key)).toEqual(['id:1', 'id:2', 'id:3']);
      expect(poller.getState()).toBe('WAITING');
      expect(poller.getStatus().isRunning).toBe(true);

      controller.abort();
      await running;
    });

    it('should go through INITIAL_CHECK before any wait', async () => {
      const states: PollerState[] = [];
      const sleeper = new ScriptedSleep(1);
      const harness: { poller?: ListingPoller } = {};
      const { poller } = createHarness({
        pages: { [SOURCE_A]: '1' },
        sleeper,
        extractor: html => {
          if (harness.poller) states.push(harness.poller.getState());
          return csvExtractor(html);
        }
      });
      harness.poller = poller;
      const controller = new AbortController();

      const running = poller.run(controller.signal);
      await sleeper.blocked;
      controller.abort();
      await running;

      expect(states).toEqual(['INITIAL_CHECK', 'CHECKING']);
      expect(poller.getState()).toBe('STOPPED');
    });

    it('should save state once more on cancellation and stop', async () => {
      const { poller, store, sleeper } = createHarness({ pages: { [SOURCE_A]: '1' } });
      const controller = new AbortController();

      const running = poller.run(controller.signal);
      await sleeper.blocked;
      expect(store.saveCount).toBe(1);

      controller.abort();
      await running;

      expect(store.saveCount).toBe(2);
      expect(Object.keys(store.saved?.[SOURCE_A] ?? {})).toEqual(['id:1']);
      expect(poller.getStatus()).toMatchObject({ state: 'STOPPED', isRunning: false, totalCycles: 1 });
    });

    it('should not check at all when cancelled before starting', async () => {
      const { poller, store, fetched } = createHarness({ pages: { [SOURCE_A]: '1' } });
      const controller = new AbortController();
      controller.abort();

      await poller.run(controller.signal);

      expect(fetched).toEqual([]);
      expect(store.saveCount).toBe(1);
      expect(store.saved).toEqual({ [SOURCE_A]: {} });
    });

    it('should only notify listings missing from the persisted state', async () => {
      const initial: SeenSet = {
        [SOURCE_A]: {
          'id:1': {
            key: 'id:1',
            title: 'Flat 1',
            price: '€ 1.100 per month',
            address: '1 Test Street',
            url: 'https://www.pararius.com/apartment-for-rent/amsterdam/flat-1',
            source: SOURCE_A,
            discoveredAt: '2024-04-01T08:00:00.000Z'
          }
        }
      };
      const notifier = new RecordingNotifier();
      const { poller, sleeper } = createHarness({
        pages: { [SOURCE_A]: '1,2' },
        store: new MemoryStore(initial),
        notifier
      });
      const controller = new AbortController();

      const running = poller.run(controller.signal);
      await sleeper.blocked;
      controller.abort();
      await running;

      expect(notifier.notified.map(s => s.key)).toEqual(['id:2']);
      expect(poller.getSeen()[SOURCE_A]['id:1'].discoveredAt).toBe('2024-04-01T08:00:00.000Z');
    });

    it('should back off after an unexpected error, then check again without the interval wait', async () => {
      const store = new MemoryStore();
      store.failNextSaves = 1;
      store.saveError = new Error('disk gone');
      const sleeper = new ScriptedSleep(1);
      const { poller, fetched } = createHarness({ pages: { [SOURCE_A]: '1' }, store, sleeper });
      const controller = new AbortController();

      const running = poller.run(controller.signal);
      await sleeper.blocked;

      // 2 × 900 s + 0.5 × 60 s, puis l'intervalle normal
      expect(sleeper.calls).toEqual([1830000, 900000]);
      expect(fetched).toEqual([SOURCE_A, SOURCE_A]);
      expect(poller.getStatus()).toMatchObject({ fatalErrors: 1, totalCycles: 2, lastError: 'disk gone' });

      controller.abort();
      await running;
      expect(store.saveCount).toBe(2);
    });
  });

  describe('checkOnce', () => {
    const signal = new AbortController().signal;

    it('should isolate a failing source from the others', async () => {
      const { poller } = createHarness({
        pages: {
          [SOURCE_A]: new FetchError(SOURCE_A, `HTTP 503 fetching ${SOURCE_A}`, { status: 503 }),
          [SOURCE_B]: '1,2'
        },
        sources: [SOURCE_A, SOURCE_B]
      });

      const report = await poller.checkOnce(signal);

      expect(report).toEqual({ newListings: 2, failedSources: 1, notificationsSent: 2, notificationsFailed: 0, saved: true });
      expect(poller.getStatus().sources).toEqual([
        { source: SOURCE_A, seen: 0, lastError: `HTTP 503 fetching ${SOURCE_A}` },
        { source: SOURCE_B, seen: 2, lastError: null }
      ]);
    });

    it('should clear a source error once the source recovers', async () => {
      const pages: Record<string, string | Error> = { [SOURCE_A]: new Error('connection reset') };
      const { poller } = createHarness({ pages });

      await poller.checkOnce(signal);
      expect(poller.getStatus().sources[0].lastError).toBe('connection reset');

      pages[SOURCE_A] = '1';
      await poller.checkOnce(signal);
      expect(poller.getStatus().sources[0].lastError).toBeNull();
    });

    it('should report extraction failures as source errors', async () => {
      const { poller } = createHarness({
        pages: { [SOURCE_A]: '1' },
        extractor: () => {
          throw new Error('unexpected markup');
        }
      });

      const report = await poller.checkOnce(signal);

      expect(report.failedSources).toBe(1);
      expect(poller.getStatus().sources[0].lastError).toBe(`Extraction failed for ${SOURCE_A} (unexpected markup)`);
    });

    it('should dump the HTML when extraction throws', async () => {
      const dumpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'poller-dump-'));
      try {
        const { poller } = createHarness({
          pages: { [SOURCE_A]: '<ul class="search-list"></ul>' },
          extractor: () => {
            throw new Error('unexpected markup');
          },
          config: { dumpDir }
        });

        const report = await poller.checkOnce(signal);

        expect(report.failedSources).toBe(1);
        const dumps = await fs.promises.readdir(dumpDir);
        expect(dumps).toHaveLength(1);
        expect(dumps[0]).toMatch(/^pararius_parse_error_\d{8}_\d{6}\.html$/);
        await expect(fs.promises.readFile(path.join(dumpDir, dumps[0]), 'utf-8')).resolves.toBe('<ul class="search-list"></ul>');
      } finally {
        await fs.promises.rm(dumpDir, { recursive: true, force: true });
      }
    });

    it('should save but send nothing when cancelled between two sources', async () => {
      const controller = new AbortController();
      // L'arrêt arrive pendant le délai de politesse avant la deuxième page
      const sleep: SleepFn = async (_ms, cancel) => {
        controller.abort();
        return !cancel.aborted;
      };
      const notifier = new RecordingNotifier();
      const { poller, store, fetched } = createHarness({
        pages: { [SOURCE_A]: '1', [SOURCE_B]: '2' },
        sources: [SOURCE_A, SOURCE_B],
        notifier,
        sleep
      });

      const report = await poller.checkOnce(controller.signal);

      expect(fetched).toEqual([SOURCE_A]);
      expect(notifier.notified).toEqual([]);
      expect(Object.keys(store.saved?.[SOURCE_A] ?? {})).toEqual(['id:1']);
      expect(report).toEqual({ newListings: 1, failedSources: 0, notificationsSent: 0, notificationsFailed: 0, saved: true });
    });

    it('should save the batch before sending any notification', async () => {
      const store = new MemoryStore();
      const savesAtNotify: number[] = [];
      const notifier: Notifier = {
        notify: async () => {
          savesAtNotify.push(store.saveCount);
          return true;
        }
      };
      const { poller } = createHarness({ pages: { [SOURCE_A]: '1,2' }, store, notifier });

      await poller.checkOnce(signal);

      expect(savesAtNotify).toEqual([1, 1]);
      expect(Object.keys(store.saved?.[SOURCE_A] ?? {})).toEqual(['id:1', 'id:2']);
    });

    it('should keep notifying when saving fails and retry the save next cycle', async () => {
      const store = new MemoryStore();
      store.failNextSaves = 1;
      store.saveError = new PersistenceError('/tmp/seen.json', 'Could not save seen listings to /tmp/seen.json');
      const notifier = new RecordingNotifier();
      const { poller } = createHarness({ pages: { [SOURCE_A]: '1,2' }, store, notifier });

      const first = await poller.checkOnce(signal);
      expect(first).toMatchObject({ saved: false, notificationsSent: 2 });
      expect(store.saved).toBeNull();

      const second = await poller.checkOnce(signal);
      expect(second).toMatchObject({ saved: true, newListings: 0 });
      expect(Object.keys(store.saved?.[SOURCE_A] ?? {})).toEqual(['id:1', 'id:2']);
    });

    it('should never re-notify listings whose notification failed', async () => {
      const notifier = new RecordingNotifier(false);
      const { poller } = createHarness({ pages: { [SOURCE_A]: '1,2,3' }, notifier });

      const first = await poller.checkOnce(signal);
      const second = await poller.checkOnce(signal);

      expect(first).toMatchObject({ newListings: 3, notificationsSent: 0, notificationsFailed: 3 });
      expect(second).toMatchObject({ newListings: 0, notificationsFailed: 0 });
      expect(notifier.notified).toHaveLength(3);
    });

    it('should survive a notifier that throws', async () => {
      const { poller } = createHarness({ pages: { [SOURCE_A]: '1' }, notifier: new RecordingNotifier('throw') });

      await expect(poller.checkOnce(signal)).resolves.toMatchObject({ notificationsFailed: 1 });
      expect(poller.getStatus()).toMatchObject({ notificationsFailed: 1, totalNewListings: 1 });
    });

    it('should keep state untouched on an empty page and dump the HTML', async () => {
      const dumpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'poller-dump-'));
      try {
        const pages: Record<string, string | Error> = { [SOURCE_A]: '1,2' };
        const { poller } = createHarness({ pages, config: { dumpDir } });

        await poller.checkOnce(signal);
        pages[SOURCE_A] = '';
        const report = await poller.checkOnce(signal);

        expect(report).toMatchObject({ newListings: 0, failedSources: 0 });
        expect(Object.keys(poller.getSeen()[SOURCE_A])).toEqual(['id:1', 'id:2']);

        const dumps = await fs.promises.readdir(dumpDir);
        expect(dumps).toHaveLength(1);
        expect(dumps[0]).toMatch(/^pararius_no_listings_\d{8}_\d{6}\.html$/);
      } finally {
        await fs.promises.rm(dumpDir, { recursive: true, force: true });
      }
    });
  });

  describe('timing', () => {
    it('should keep the wait within the jitter band around the interval', () => {
      const wait = (random: number) => createHarness({ pages: {}, random: () => random }).poller.nextWaitMs();

      expect(wait(0)).toBeCloseTo(810_000);
      expect(wait(0.5)).toBeCloseTo(900_000);
      expect(wait(1)).toBeCloseTo(990_000);
    });

    it('should never wait less than the floor', () => {
      const { poller } = createHarness({ pages: {}, config: { intervalMs: 30_000 } });
      expect(poller.nextWaitMs()).toBe(60_000);
    });

    it('should back off for twice the interval plus random jitter', () => {
      const { poller } = createHarness({ pages: {}, config: { intervalMs: 600_000 } });
      expect(poller.fatalBackoffMs()).toBe(1_230_000);
    });
  });
});
