import { RawRecord } from '../types/listing';
import { absoluteUrl, cleanText, loadHtml } from './html';

export const PARARIUS_ORIGIN = 'https://www.pararius.com';

const ITEM_SELECTOR = 'ul.search-list li.search-list__item--listing';

/**
 * Annonces d'une page de résultats Pararius
 */
export function extractPararius(html: string): RawRecord[] {
  const $ = loadHtml(html);
  const records: RawRecord[] = [];

  $(ITEM_SELECTOR).each((_, element) => {
    const item = $(element);

    const title = cleanText(item.find('.listing-search-item__title').first().text());
    const href = item.find('a.listing-search-item__link--title').first().attr('href');
    const price = cleanText(item.find('.listing-search-item__price').first().text());
    const address = cleanText(item.find('.listing-search-item__location').first().text());
    const candidateId = cleanText(item.attr('data-listing-id') || item.attr('id'));

    records.push({
      title: title || 'No title',
      price: price || 'Price not available',
      address: address || 'Address not available',
      url: absoluteUrl(href, PARARIUS_ORIGIN),
      candidateId: candidateId || undefined,
      fingerprint: cleanText(item.text())
    });
  });

  return records;
}
