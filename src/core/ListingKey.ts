import { createHash } from 'crypto';
import { ListingKey, RawRecord } from '../types/listing';

// Patterns d'id numérique dans l'URL de détail, du plus spécifique au plus générique
const URL_ID_PATTERNS: RegExp[] = [
  /\/object-(\d+)\/?$/,
  /\/(?:appartement|apartment|huis|house|kamer|room|studio|garage|parkeerplaats|bouwgrond|project|woning)-(\d+)/,
  /\/(\d+)\/?$/
];

// Normalise une URL pour la stabilité de la clé: https, sans query ni fragment
export function normalizeUrl(u?: string | null): string {
  if (!u) return '';
  const trimmed = u.trim();
  try {
    const url = new URL(trimmed);
    url.protocol = 'https:';
    url.search = '';
    url.hash = '';
    const normalized = url.toString();
    return url.pathname.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
  } catch {
    return trimmed;
  }
}

/**
 * Extrait l'id numérique d'une URL de détail, ou null
 */
export function extractIdFromUrl(u?: string | null): string | null {
  const url = normalizeUrl(u);
  if (!url) return null;

  for (const pattern of URL_ID_PATTERNS) {
    const match = pattern.exec(url);
    if (match) {
      return match[1];
    }
  }
  return null;
}

/**
 * Hash SHA-256 du contenu de l'annonce (fingerprint si fourni, sinon champs visibles)
 */
export function contentHash(raw: RawRecord): string {
  const fingerprint = collapse(raw.fingerprint);
  const payload = fingerprint
    ? fingerprint
    : [collapse(raw.title), collapse(raw.price), collapse(raw.address), normalizeUrl(raw.url)].join('|');
  return createHash('sha256').update(payload).digest('hex');
}

/**
 * Résout la clé d'une annonce. Ne lève jamais et retourne toujours une clé non vide.
 * Priorité: id fourni par l'extracteur, id numérique de l'URL, hash du contenu.
 * Deux annonces sans id au contenu identique obtiennent la même clé.
 */
export function resolveListingKey(raw: RawRecord): ListingKey {
  const candidate = raw.candidateId?.trim();
  if (candidate) {
    return `id:${candidate}`;
  }

  const urlId = extractIdFromUrl(raw.url);
  if (urlId) {
    return `url:${urlId}`;
  }

  return `hash:${contentHash(raw)}`;
}

/**
 * Indique quelle stratégie a produit la clé
 */
export function keyStrategy(key: ListingKey): 'id' | 'url' | 'hash' | 'unknown' {
  const separator = key.indexOf(':');
  if (separator < 0) return 'unknown';
  const prefix = key.slice(0, separator);
  return prefix === 'id' || prefix === 'url' || prefix === 'hash' ? prefix : 'unknown';
}

function collapse(value?: string | null): string {
  return (value || '').replace(/\s+/g, ' ').trim();
}
