import * as cheerio from 'cheerio';

export type CheerioAPI = cheerio.CheerioAPI;

export function loadHtml(html: string): CheerioAPI {
  return cheerio.load(html);
}

// Espaces multiples et retours à la ligne ramenés à un seul espace
export function cleanText(value: string | undefined | null): string {
  return (value || '').replace(/\s+/g, ' ').trim();
}

/**
 * Rend un href absolu sur `origin`, sans query ni fragment si `stripQuery`
 */
export function absoluteUrl(href: string | undefined, origin: string, stripQuery: boolean = false): string {
  if (!href) return '';
  try {
    const url = new URL(href.trim(), origin);
    if (stripQuery) {
      url.search = '';
      url.hash = '';
    }
    return url.toString();
  } catch {
    return '';
  }
}
