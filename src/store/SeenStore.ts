import fs from 'fs';
import path from 'path';
import { PersistenceError, describeError } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { ListingKey, ListingSnapshot, SeenSet, Source } from '../types/listing';

/**
 * Garantit l'existence de l'entrée d'une source (idempotent)
 */
export function ensureSource(seen: SeenSet, source: Source): Record<ListingKey, ListingSnapshot> {
  if (Object.hasOwn(seen, source)) {
    return seen[source];
  }
  const entries: Record<ListingKey, ListingSnapshot> = {};
  seen[source] = entries;
  return entries;
}

export function countSeen(seen: SeenSet, source: Source): number {
  return Object.hasOwn(seen, source) ? Object.keys(seen[source]).length : 0;
}

// Clés qui, affectées sur un objet littéral, toucheraient son prototype
const UNSAFE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Fichier JSON des annonces déjà vues: source -> clé -> snapshot.
 * Réécriture complète à chaque cycle, via fichier temporaire + rename.
 */
export class SeenStore {
  private readonly filePath: string;
  private readonly logger: StructuredLogger;

  constructor(filePath: string, logger: StructuredLogger) {
    this.filePath = path.resolve(filePath);
    this.logger = logger.child('SeenStore');
  }

  /**
   * Charge l'état persisté. Fichier absent ou corrompu = état vide, jamais d'exception.
   */
  async load(): Promise<SeenSet> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn(`📚 No state file at ${this.filePath}, starting with an empty seen set`);
      } else {
        this.logger.warn(`⚠️ State file unreadable, starting with an empty seen set: ${describeError(error)}`, {
          filePath: this.filePath
        });
      }
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warn(`⚠️ State file corrupted, starting with an empty seen set: ${describeError(error)}`, {
        filePath: this.filePath
      });
      return {};
    }

    if (!isPlainObject(parsed)) {
      this.logger.warn('⚠️ State file has an unexpected shape, starting with an empty seen set', {
        filePath: this.filePath
      });
      return {};
    }

    const seen = this.sanitize(parsed);
    const total = Object.values(seen).reduce((sum, entries) => sum + Object.keys(entries).length, 0);
    this.logger.info(`📚 Loaded ${total} seen listings for ${Object.keys(seen).length} sources`, {
      filePath: this.filePath
    });
    return seen;
  }

  /**
   * Écrit l'état complet. Un crash pendant l'écriture laisse l'ancien fichier intact.
   */
  async save(seen: SeenSet): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(tmpPath, JSON.stringify(seen, null, 2), 'utf-8');
      await fs.promises.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug(`Could not remove ${tmpPath}: ${describeError(cleanupError)}`);
      });
      throw new PersistenceError(this.filePath, `Could not save seen listings to ${this.filePath}`, error);
    }

    this.logger.debug(`💾 Seen set saved to ${this.filePath}`);
  }

  ensureSource(seen: SeenSet, source: Source): Record<ListingKey, ListingSnapshot> {
    return ensureSource(seen, source);
  }

  // Ne garde que les entrées au format snapshot; les champs inconnus sont ignorés
  private sanitize(raw: Record<string, unknown>): SeenSet {
    const seen: SeenSet = {};
    let dropped = 0;

    for (const [source, entries] of Object.entries(raw)) {
      if (UNSAFE_KEYS.has(source) || !isPlainObject(entries)) {
        dropped++;
        continue;
      }

      const bySource = ensureSource(seen, source);
      for (const [key, value] of Object.entries(entries)) {
        const snapshot = UNSAFE_KEYS.has(key) ? null : toSnapshot(source, key, value);
        if (snapshot) {
          bySource[key] = snapshot;
        } else {
          dropped++;
        }
      }
    }

    if (dropped > 0) {
      this.logger.warn(`⚠️ Ignored ${dropped} malformed entries in state file`, { filePath: this.filePath });
    }
    return seen;
  }
}

function toSnapshot(source: Source, key: ListingKey, value: unknown): ListingSnapshot | null {
  if (!isPlainObject(value)) return null;

  const { title, price, address, url, discoveredAt } = value;
  if (
    typeof title !== 'string' ||
    typeof price !== 'string' ||
    typeof address !== 'string' ||
    typeof url !== 'string' ||
    typeof discoveredAt !== 'string'
  ) {
    return null;
  }

  return { key, title, price, address, url, source, discoveredAt };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
