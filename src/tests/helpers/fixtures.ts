import { ListingSnapshot, Notifier, RawRecord, SeenSet } from '../../types/listing';
import { SeenPersistence, SleepFn } from '../../watchers/ListingPoller';

export const SOURCE_A = 'https://www.pararius.com/apartments/amsterdam';
export const SOURCE_B = 'https://www.pararius.com/apartments/utrecht';

export function record(id: string, overrides: Partial<RawRecord> = {}): RawRecord {
  return {
    title: `Flat ${id}`,
    price: `€ 1.${id}00 per month`,
    address: `${id} Test Street`,
    url: `https://www.pararius.com/apartment-for-rent/amsterdam/flat-${id}`,
    candidateId: id,
    ...overrides
  };
}

export function deepCopy(seen: SeenSet): SeenSet {
  return JSON.parse(JSON.stringify(seen));
}

/**
 * Store en mémoire: garde la dernière sauvegarde
 */
export class MemoryStore implements SeenPersistence {
  saved: SeenSet | null = null;
  saveCount = 0;
  failNextSaves = 0;
  saveError: Error | null = null;

  constructor(private initial: SeenSet = {}) {}

  async load(): Promise<SeenSet> {
    return deepCopy(this.initial);
  }

  async save(seen: SeenSet): Promise<void> {
    if (this.failNextSaves > 0 && this.saveError) {
      this.failNextSaves--;
      throw this.saveError;
    }
    this.saveCount++;
    this.saved = deepCopy(seen);
  }
}

export class RecordingNotifier implements Notifier {
  notified: ListingSnapshot[] = [];

  constructor(private result: boolean | 'throw' = true) {}

  async notify(snapshot: ListingSnapshot): Promise<boolean> {
    this.notified.push(snapshot);
    if (this.result === 'throw') {
      throw new Error('notifier exploded');
    }
    return this.result;
  }
}

/**
 * Attentes simulées: les délais courts (politesse, notifications) passent immédiatement,
 * les longues attentes passent `allowLongWaits` fois puis bloquent jusqu'à l'annulation.
 */
export class ScriptedSleep {
  calls: number[] = [];
  private markBlocked: () => void = () => undefined;
  readonly blocked: Promise<void> = new Promise(resolve => {
    this.markBlocked = resolve;
  });

  constructor(private allowLongWaits: number = 0, private longThresholdMs: number = 60_000) {}

  readonly sleep: SleepFn = (ms, signal) => {
    this.calls.push(ms);
    if (signal.aborted) return Promise.resolve(false);
    if (ms < this.longThresholdMs) return Promise.resolve(true);
    if (this.allowLongWaits > 0) {
      this.allowLongWaits--;
      return Promise.resolve(true);
    }

    return new Promise(resolve => {
      signal.addEventListener('abort', () => resolve(false), { once: true });
      this.markBlocked();
    });
  };
}
