import { keyStrategy, resolveListingKey } from './ListingKey';
import { StructuredLogger } from './StructuredLogger';
import { ensureSource } from '../store/SeenStore';
import { ListingSnapshot, RawRecord, SeenSet, Source } from '../types/listing';

export interface DetectionResult {
  newSnapshots: ListingSnapshot[];
  seen: SeenSet;
  extractionEmpty: boolean;
  alreadySeen: number;
}

/**
 * Compare les annonces extraites au seen set d'une source.
 * Une clé déjà présente n'est jamais re-signalée, même si titre/prix/adresse ont changé.
 */
export class ChangeDetector {
  private readonly logger: StructuredLogger;
  private readonly clock: () => Date;

  constructor(logger: StructuredLogger, clock: () => Date = () => new Date()) {
    this.logger = logger.child('ChangeDetector');
    this.clock = clock;
  }

  /**
   * Classe les annonces en nouvelles / déjà vues et enregistre les nouvelles dans `seen` (muté sur place)
   */
  detect(source: Source, records: readonly RawRecord[], seen: SeenSet): DetectionResult {
    // Page vide = échec d'extraction probable: on ne touche pas à l'état de la source
    if (records.length === 0) {
      this.logger.warn('⚠️ Extraction returned zero listings, keeping previous state untouched', { source });
      return { newSnapshots: [], seen, extractionEmpty: true, alreadySeen: 0 };
    }

    const known = ensureSource(seen, source);
    const discoveredAt = this.clock().toISOString();
    const newSnapshots: ListingSnapshot[] = [];
    let alreadySeen = 0;

    for (const raw of records) {
      const key = resolveListingKey(raw);

      if (Object.hasOwn(known, key)) {
        alreadySeen++;
        this.logger.debug(`⏭️ Listing ${key} already seen, skipping`, { source });
        continue;
      }

      const snapshot: ListingSnapshot = {
        key,
        title: raw.title,
        price: raw.price,
        address: raw.address,
        url: raw.url,
        source,
        discoveredAt
      };
      known[key] = snapshot;
      newSnapshots.push(snapshot);
      this.logger.info(`🆕 New listing detected: ${snapshot.title}`, { source, key, strategy: keyStrategy(key) });
    }

    this.logger.info(`✅ ${newSnapshots.length} new / ${alreadySeen} already seen`, { source });
    return { newSnapshots, seen, extractionEmpty: false, alreadySeen };
  }
}
