/**
 * Types partagés du moniteur d'annonces immobilières
 */

/** URL d'une page de résultats surveillée */
export type Source = string;

/** Identifiant stable d'une annonce au sein d'une source */
export type ListingKey = string;

/**
 * Annonce brute telle qu'extraite d'une page, avant résolution de l'identité
 */
export interface RawRecord {
  title: string;
  price: string; // texte brut, jamais parsé
  address: string;
  url: string;
  candidateId?: string;
  fingerprint?: string; // markup ou texte brut de l'annonce (repli du hash)
}

/**
 * Représentation figée d'une annonce au moment de sa découverte
 */
export interface ListingSnapshot {
  key: ListingKey;
  title: string;
  price: string;
  address: string;
  url: string;
  source: Source;
  discoveredAt: string; // ISO-8601
}

export type SeenSet = Record<Source, Record<ListingKey, ListingSnapshot>>;

/**
 * Transforme le HTML d'une page en annonces brutes (liste vide = aucune annonce)
 */
export type Extractor = (html: string) => RawRecord[];

export interface Notifier {
  notify(snapshot: ListingSnapshot): Promise<boolean>;
}
