import axios from 'axios';
import { FetchError } from '../core/errors';

export interface PageFetcherConfig {
  timeoutMs: number;
  userAgents: string[];
  acceptLanguage: string;
}

// Navigateurs courants, tirés au hasard à chaque requête
export const DEFAULT_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36'
];

/**
 * Récupère le HTML d'une page de résultats, toujours borné par un timeout
 */
export class PageFetcher {
  private readonly config: PageFetcherConfig;
  private readonly random: () => number;

  constructor(config: Partial<PageFetcherConfig> = {}, random: () => number = Math.random) {
    this.config = {
      timeoutMs: 20000,
      userAgents: DEFAULT_USER_AGENTS,
      acceptLanguage: 'en-US,en;q=0.9,nl;q=0.8',
      ...config
    };
    this.random = random;
  }

  buildHeaders(): Record<string, string> {
    const agents = this.config.userAgents.length > 0 ? this.config.userAgents : DEFAULT_USER_AGENTS;
    const index = Math.min(agents.length - 1, Math.floor(this.random() * agents.length));

    return {
      'User-Agent': agents[index],
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
      'Accept-Language': this.config.acceptLanguage,
      'Upgrade-Insecure-Requests': '1',
      'Cache-Control': 'max-age=0'
    };
  }

  /**
   * GET du document. Lève FetchError en cas de réseau, timeout ou statut HTTP non 2xx.
   */
  async fetch(url: string, signal?: AbortSignal): Promise<string> {
    try {
      const response = await axios.get<string>(url, {
        headers: this.buildHeaders(),
        timeout: this.config.timeoutMs,
        responseType: 'text',
        transformResponse: (data: string) => data,
        signal
      });
      return typeof response.data === 'string' ? response.data : String(response.data);
    } catch (error) {
      throw this.toFetchError(url, error);
    }
  }

  private toFetchError(url: string, error: unknown): FetchError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status !== undefined) {
        return new FetchError(url, `HTTP ${status} fetching ${url}`, { status, cause: error });
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new FetchError(url, `Timeout after ${this.config.timeoutMs}ms fetching ${url}`, { timedOut: true, cause: error });
      }
      return new FetchError(url, `Network error fetching ${url}: ${error.code || error.message}`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new FetchError(url, `Network error fetching ${url}: ${message}`, { cause: error });
  }
}
