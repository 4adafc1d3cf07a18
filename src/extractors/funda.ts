import { RawRecord } from '../types/listing';
import { absoluteUrl, cleanText, loadHtml } from './html';

export const FUNDA_ORIGIN = 'https://www.funda.nl';

// Du balisage le plus récent au plus ancien
export const FUNDA_ITEM_SELECTORS = [
  '[data-test-id="search-result-item"]',
  'div.border-b.pb-3',
  'ol.search-results li.search-result'
];

const LINK_SELECTORS = [
  'a[data-testid="listingDetailsAddress"]',
  'a[href*="/koop/"], a[href*="/huur/"], a[href*="/object/"]',
  'a[href*="/detail/"]'
];

const POSTCODE_PATTERN = /\d{4}\s?[A-Z]{2}/;
const PRICE_PATTERN = /€\s*\d+(?:[.,]\d+)*/;

export const TITLE_NOT_FOUND = 'Title not found';
export const PRICE_NOT_FOUND = 'Price not found';
export const ADDRESS_NOT_FOUND = 'Address not found';

/**
 * Annonces d'une page de résultats Funda.
 * Les éléments sans lien vers une page de détail sont ignorés.
 */
export function extractFunda(html: string): RawRecord[] {
  const $ = loadHtml(html);
  const records: RawRecord[] = [];

  const selector = FUNDA_ITEM_SELECTORS.find(candidate => $(candidate).length > 0);
  if (!selector) {
    return records;
  }

  $(selector).each((_, element) => {
    const item = $(element);

    const link = LINK_SELECTORS.map(linkSelector => item.find(linkSelector).first()).find(found => found.length > 0);
    if (!link) return;

    const headings = link.find('h1, h2, h3, h4').first();
    const paragraphs = link.find('p').toArray().map(paragraph => $(paragraph).text());

    // Feuilles de l'arbre uniquement, pour ne pas prendre un bloc entier comme prix
    const leafTexts = item
      .find('*')
      .toArray()
      .filter(node => $(node).children().length === 0)
      .map(node => $(node).text());

    const objectId = /(\d+)$/.exec(cleanText(item.attr('data-object-id')));

    records.push({
      title: pickTitle(
        link.find('div.flex.font-semibold span.truncate').first().text(),
        headings.length > 0 ? headings.text() : '',
        link.text()
      ),
      price: pickPrice(
        item.find('div.text-xl.font-semibold, p.text-xl.font-semibold').first().text(),
        item.find('[data-testid="price-rent"], [data-testid="price-sale"]').first().text(),
        leafTexts
      ),
      address: pickAddress(link.find('div.truncate.text-neutral-80').first().text(), paragraphs),
      url: absoluteUrl(link.attr('href'), FUNDA_ORIGIN, true),
      candidateId: objectId ? objectId[1] : undefined,
      fingerprint: cleanText(item.text())
    });
  });

  return records;
}

export function pickTitle(spanText: string, headingText: string, linkText: string): string {
  const span = cleanText(spanText);
  if (span) return span;

  const heading = firstLine(headingText);
  if (heading) return heading;

  // Texte du lien si sa longueur ressemble à un titre
  const fromLink = firstLine(linkText);
  if (fromLink.length > 5 && fromLink.length < 100) return fromLink;

  return TITLE_NOT_FOUND;
}

export function pickAddress(addressText: string, paragraphs: string[]): string {
  const address = cleanText(addressText);
  if (address) return address;

  for (const paragraph of paragraphs) {
    const text = cleanText(paragraph);
    if (POSTCODE_PATTERN.test(text)) return text;
  }

  return ADDRESS_NOT_FOUND;
}

export function pickPrice(styledText: string, taggedText: string, leafTexts: string[]): string {
  const styled = cleanText(styledText);
  if (styled.includes('€')) return styled;

  const tagged = cleanText(taggedText);
  if (tagged) return tagged;

  let best = '';
  for (const leaf of leafTexts) {
    const text = cleanText(leaf);
    if (PRICE_PATTERN.test(text) && text.length < 70 && text.length > best.length) {
      best = text;
    }
  }

  return best || PRICE_NOT_FOUND;
}

function firstLine(text: string): string {
  return text.split('\n').map(line => line.trim()).find(line => line.length > 0) || '';
}
